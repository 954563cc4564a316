import { getArray, getRecord, getString, isRecord } from '../validation.js';
import { plainText } from './properties.js';

const URL_SOURCES = ['external', 'file'];

function urlOf(data: Record<string, unknown>): string {
  const direct = getString(data, 'url');
  if (direct) return direct;
  for (const key of URL_SOURCES) {
    const nested = getRecord(data, key);
    const url = nested && getString(nested, 'url');
    if (url) return url;
  }
  return '';
}

/**
 * Searchable text of a single block, without its children. Child pages and
 * databases contribute their title only; their content belongs to their own
 * records.
 */
export function blockText(block: Record<string, unknown>): string {
  const type = getString(block, 'type');
  if (!type) return '';
  const data = getRecord(block, type);
  if (!data) return '';

  switch (type) {
    case 'child_page':
    case 'child_database':
      return getString(data, 'title') ?? '';
    case 'table_row':
      return getArray(data, 'cells')
        .map(cell => plainText(Array.isArray(cell) ? cell : []))
        .join(' | ');
    case 'to_do': {
      const text = plainText(getArray(data, 'rich_text'));
      return `${data.checked === true ? '[x]' : '[ ]'} ${text}`;
    }
    case 'equation':
      return getString(data, 'expression') ?? '';
    case 'table_of_contents':
    case 'divider':
    case 'breadcrumb':
      return '';
    default:
      break;
  }

  if ('rich_text' in data) {
    const text = plainText(getArray(data, 'rich_text'));
    const caption = plainText(getArray(data, 'caption'));
    return caption ? `${text}\n${caption}` : text;
  }
  // bookmark, embed, image, file, pdf, video, link_preview
  const url = urlOf(data);
  const caption = plainText(getArray(data, 'caption'));
  return [caption, url].filter(Boolean).join(' ');
}

/** True for blocks crawled as nodes of their own (see childRefs in the Notion source). */
export function isNestedBlockNode(block: Record<string, unknown>): boolean {
  const type = getString(block, 'type');
  return block.has_children === true && type !== 'child_page' && type !== 'child_database';
}

export function blocksOf(content: unknown): Record<string, unknown>[] {
  return isRecord(content) ? getArray(content, 'blocks').filter(isRecord) : [];
}
