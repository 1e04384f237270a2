/**
 * DetailResolverService - flattens an event's detail panel into one string:
 * "Label: Value | Label: Value".
 *
 * Collapsed panels are expanded through the page source; the resolver only
 * decides when that is needed.
 */
import type { DetailRef } from '../types/calendar';
import type { DataIssue } from '../types/DataQuality';
import type { PageSource } from '../types/provider';
import { errorMessage } from '../types/errors';
import { byTag, cleanText, findAll, hasClass, parsePageTree, type PageNode } from '../utils/pageTree';

export interface ResolvedDetail {
  detail: string;
  issue?: DataIssue;
}

export function needsExpansion(ref: DetailRef | undefined): ref is Extract<DetailRef, { state: 'collapsed' }> {
  return ref !== undefined && ref.state === 'collapsed';
}

/**
 * Label/value pairs from the last calendarspecs table in the panel. A panel
 * without that structure yields its raw text unmodified.
 */
export function flattenDetailPanel(panel: PageNode): string {
  const tables = findAll(panel, (n) => n.tag === 'table' && hasClass(n, 'calendarspecs'));
  const table = tables[tables.length - 1];

  if (table) {
    // Repeated labels keep their first position and their last value.
    const specs = new Map<string, string>();
    for (const tr of findAll(table, byTag('tr'))) {
      const cells = tr.children.filter((c) => c.tag === 'td' || c.tag === 'th');
      if (cells.length < 2) continue;
      const label = cleanText(cells[0].text);
      const value = cleanText(cells[1].text);
      if (!label && !value) continue;
      specs.set(label, value);
    }
    if (specs.size > 0) {
      return Array.from(specs, ([label, value]) => `${label}: ${value}`).join(' | ');
    }
  }

  return panel.text.trim() ? panel.text : '';
}

export class DetailResolverService {
  async resolve(
    ref: DetailRef | undefined,
    source: Pick<PageSource, 'expandDetail' | 'url'>
  ): Promise<ResolvedDetail> {
    if (!ref) return { detail: '' };
    if (!needsExpansion(ref)) return { detail: flattenDetailPanel(ref.panel) };

    try {
      const html = await source.expandDetail(ref.eventId);
      return { detail: flattenDetailPanel(parsePageTree(html)) };
    } catch (error) {
      console.warn(`[DetailResolver] Could not expand detail for event ${ref.eventId}: ${errorMessage(error)}`);
      return {
        detail: '',
        issue: {
          type: 'DETAIL_PARSE_WARNING',
          message: `Detail panel for event ${ref.eventId} could not be expanded: ${errorMessage(error)}`,
          url: source.url,
          details: { eventId: ref.eventId },
        },
      };
    }
  }
}
