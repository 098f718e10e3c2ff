/**
 * NBS listing HTML parser
 *
 * The published code listings changed markup between editions:
 *
 * - table (2012): one `<tr>` per division, no indentation. Level comes
 *   from the code's zero groups.
 * - nbsp (2013): one `<p>` per division; the code and name are separated
 *   by 3, 5 or 7 `&nbsp;` for levels 1, 2 and 3.
 * - span (2014-2015): the first `<span>` holds the code, the last holds
 *   the name indented by one to three U+3000 per level.
 *
 * Document order is preserved; it breaks ties between same-named
 * siblings during matching.
 *
 * @module parsers/listing-html
 */

import { JSDOM, VirtualConsole } from 'jsdom';
import { levelOfCode } from '../core/codes.js';
import type { ListingVersion } from '../core/constants.js';
import { ParseError } from '../core/errors.js';
import { isAdminLevel, type AdminLevel, type ParseIssue, type ParseResult, type RegionRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'listing-html' });

export type ListingLayout = 'table' | 'nbsp' | 'span';

const LAYOUT_SELECTORS: Record<ListingLayout, string> = {
  table: 'div.TRS_Editor table.MsoNormalTable tr',
  nbsp: 'div.TRS_Editor p.MsoNormal',
  span: 'div.TRS_Editor p.MsoNormal',
};

const NBSP = '\u00a0';
const IDEOGRAPHIC_SPACE = '\u3000';

interface ParsedNode {
  readonly code: number;
  readonly nameZh: string;
  readonly level: AdminLevel;
}

/**
 * Markup layout used by a listing version
 */
export function layoutForVersion(version: ListingVersion): ListingLayout {
  const year = Number(version.slice(0, 4));
  if (year <= 2012) return 'table';
  if (year === 2013) return 'nbsp';
  return 'span';
}

function parseCodeToken(token: string | undefined, location: string): number {
  const trimmed = token?.trim() ?? '';
  if (!/^\d{6}$/.test(trimmed)) {
    throw new ParseError(`no six-digit code in "${trimmed}"`, location);
  }
  return Number(trimmed);
}

function requireName(name: string | undefined, location: string): string {
  const trimmed = name?.trim() ?? '';
  if (trimmed === '' || /^\d+$/.test(trimmed)) {
    throw new ParseError('missing division name', location);
  }
  return trimmed;
}

/**
 * Code first, name last, level from the code
 */
function fromBareText(text: string, location: string): ParsedNode {
  const tokens = text.split(/\s+/u).filter((token) => token !== '');
  if (tokens.length < 2) {
    throw new ParseError(`expected code and name in "${text.trim()}"`, location);
  }
  const code = parseCodeToken(tokens[0], location);
  const nameZh = requireName(tokens[tokens.length - 1], location);
  return { code, nameZh, level: levelOfCode(code) };
}

function fromNbspParagraph(text: string, location: string): ParsedNode {
  const parts = text.replace(/[ \t\r\n]/g, '').split(NBSP);
  if (parts.length !== 4 && parts.length !== 6 && parts.length !== 8) {
    throw new ParseError(`unexpected indentation (${parts.length - 1} &nbsp;)`, location);
  }
  const level = (parts.length - 2) / 2;
  if (!isAdminLevel(level)) {
    throw new ParseError(`unexpected indentation (${parts.length - 1} &nbsp;)`, location);
  }
  return {
    code: parseCodeToken(parts[0], location),
    nameZh: requireName(parts[parts.length - 1], location),
    level,
  };
}

function fromSpanParagraph(element: Element, location: string): ParsedNode {
  const spans = Array.from(element.querySelectorAll('span'));
  const text = element.textContent ?? '';
  const first = spans[0]?.textContent?.trim() ?? '';

  // Some rows put code and padding in one span and the name in plain text
  if (spans.length < 2 || !/^\d{6}$/.test(first)) {
    logger.debug('Fallback to plain text', { location, text: text.trim() });
    return fromBareText(text, location);
  }

  const code = Number(first);
  const rawName = spans[spans.length - 1]?.textContent ?? '';
  const nameZh = requireName(rawName, location);
  const indent = rawName.split(IDEOGRAPHIC_SPACE).length - 1;

  if (isAdminLevel(indent)) {
    return { code, nameZh, level: indent };
  }

  const level = levelOfCode(code);
  logger.debug('Inferred level from code', { code, level, indent });
  return { code, nameZh, level };
}

function parseNode(element: Element, layout: ListingLayout, location: string): ParsedNode {
  const text = element.textContent ?? '';
  switch (layout) {
    case 'table':
      return fromBareText(text, location);
    case 'nbsp':
      return fromNbspParagraph(text, location);
    case 'span':
      return fromSpanParagraph(element, location);
  }
}

/**
 * Parse a listing page into scraped records
 *
 * Nodes without a code or name are skipped and reported; a repeated code
 * keeps its first occurrence.
 */
export function parseListingHtml(html: string, layout: ListingLayout): ParseResult<RegionRecord> {
  const virtualConsole = new VirtualConsole();
  const dom = new JSDOM(html, { virtualConsole });
  const elements = dom.window.document.querySelectorAll(LAYOUT_SELECTORS[layout]);

  const records: RegionRecord[] = [];
  const issues: ParseIssue[] = [];
  const seen = new Set<number>();

  elements.forEach((element, index) => {
    if ((element.textContent ?? '').trim() === '') return;

    const location = `node ${index + 1}`;
    try {
      const node = parseNode(element, layout, location);
      if (seen.has(node.code)) {
        throw new ParseError(`duplicate code ${node.code}`, location);
      }
      seen.add(node.code);
      records.push(node);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      issues.push({ source: 'scraped', location: error.location, message: error.message });
      logger.warn('Skipped listing node', { location: error.location, reason: error.message });
    }
  });

  dom.window.close();
  return { records, issues };
}
