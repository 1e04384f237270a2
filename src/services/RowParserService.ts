/**
 * RowParserService - turns a rendered calendar table into raw rows.
 *
 * Works on the PageNode tree, not on a DOM library. Output order is document
 * order; the date/time normalizer relies on it for carry-forward.
 */
import type { DetailRef, Impact, RawRow } from '../types/calendar';
import type { DataIssue, ValidationResult } from '../types/DataQuality';
import {
  byClass,
  byTag,
  classContains,
  cleanText,
  findAll,
  findFirst,
  parsePageTree,
  type PageNode,
} from '../utils/pageTree';

const REQUIRED_CELLS = [
  'calendar__time',
  'calendar__currency',
  'calendar__impact',
  'calendar__event',
  'calendar__actual',
  'calendar__forecast',
  'calendar__previous',
] as const;

type CellName = (typeof REQUIRED_CELLS)[number];

function isCalendarRow(node: PageNode): boolean {
  return node.tag === 'tr' && (classContains(node, 'calendar__row') || isDetailRow(node));
}

function isDetailRow(node: PageNode): boolean {
  return node.tag === 'tr' && classContains(node, 'calendar__details--detail');
}

function isDayBreaker(node: PageNode): boolean {
  return classContains(node, 'calendar__row--day-breaker');
}

/**
 * Impact from the icon span's title ("High Impact Expected") or class
 * (icon--ff-impact-red), falling back to the cell text.
 */
export function readImpact(cell: PageNode): Impact {
  const span = findFirst(cell, byTag('span'));
  const signals = [span?.attributes.title ?? '', span?.attributes.class ?? '', cleanText(cell.text)]
    .join(' ')
    .toLowerCase();

  if (/impact-red|\bhigh\b/.test(signals)) return 'High';
  if (/impact-ora|\bmedium\b/.test(signals)) return 'Medium';
  if (/impact-yel|\blow\b/.test(signals)) return 'Low';
  if (/impact-gr[ae]|non-economic|holiday/.test(signals)) return 'Holiday';
  return 'Unknown';
}

function readDetailRef(row: PageNode): DetailRef | undefined {
  const eventId = row.attributes['data-event-id'];
  if (!eventId) return undefined;
  const detailCell = findFirst(row, byClass('calendar__detail'));
  if (!detailCell || !findFirst(detailCell, byTag('a'))) return undefined;
  return { state: 'collapsed', eventId };
}

export class RowParserService {
  parseHtml(html: string, url?: string): ValidationResult<RawRow> {
    return this.parse(parsePageTree(html), url);
  }

  parse(root: PageNode, url?: string): ValidationResult<RawRow> {
    const rows: RawRow[] = [];
    const issues: DataIssue[] = [];
    let pendingHeader = '';
    // Index in `rows` of the event emitted by the previous <tr>, if any.
    let previousIndex = -1;

    for (const tr of findAll(root, isCalendarRow)) {
      if (isDetailRow(tr)) {
        const previous = previousIndex >= 0 ? rows[previousIndex] : undefined;
        if (previous) {
          const eventId = previous.detail?.eventId ?? tr.attributes['data-event-id'] ?? '';
          rows[previousIndex] = { ...previous, detail: { state: 'expanded', eventId, panel: tr } };
        } else {
          issues.push({
            type: 'PARSE_WARNING',
            message: 'Detail panel without a preceding event row',
            url,
          });
        }
        previousIndex = -1;
        continue;
      }

      previousIndex = -1;

      if (isDayBreaker(tr)) {
        const cell = findFirst(tr, byClass('calendar__date')) ?? findFirst(tr, byClass('calendar__cell')) ?? tr;
        pendingHeader = cleanText(cell.text);
        continue;
      }

      const cells = new Map<CellName, PageNode>();
      const missing: CellName[] = [];
      for (const name of REQUIRED_CELLS) {
        const cell = findFirst(tr, byClass(name));
        if (cell) {
          cells.set(name, cell);
        } else {
          missing.push(name);
        }
      }

      const ownHeader = cleanText(findFirst(tr, byClass('calendar__date'))?.text ?? '');

      if (missing.length > 0) {
        issues.push({
          type: 'PARSE_WARNING',
          message: `Row is missing cells: ${missing.join(', ')}`,
          url,
          details: { missing, text: cleanText(tr.text).slice(0, 120) },
        });
        if (ownHeader) pendingHeader = ownHeader;
        continue;
      }

      const text = (name: CellName) => cleanText(cells.get(name)?.text ?? '');
      const eventCell = cells.get('calendar__event');
      const titleNode = eventCell ? findFirst(eventCell, byClass('calendar__event-title')) : undefined;
      const event = cleanText(titleNode?.text ?? eventCell?.text ?? '');

      if (!event) {
        issues.push({ type: 'ROW_WITHOUT_EVENT', message: 'Row has no event name', url });
        // The header still applies to the rows that follow.
        if (ownHeader) pendingHeader = ownHeader;
        continue;
      }

      const impactCell = cells.get('calendar__impact');
      const row: RawRow = {
        dateHeader: ownHeader || pendingHeader,
        time: text('calendar__time'),
        currency: text('calendar__currency'),
        impact: impactCell ? readImpact(impactCell) : 'Unknown',
        event,
        actual: text('calendar__actual'),
        forecast: text('calendar__forecast'),
        previous: text('calendar__previous'),
        detail: readDetailRef(tr),
      };
      pendingHeader = '';
      rows.push(row);
      previousIndex = rows.length - 1;
    }

    return { valid: rows, issues };
  }
}
