import type { RustdocItem, RustdocItemKind } from '../types/docs.js';

export const ITEM_KINDS = [
  'mod',
  'macro',
  'struct',
  'enum',
  'constant',
  'trait',
  'fn',
  'type',
  'static',
  'union',
  'attr',
  'derive',
  'primitive',
] as const satisfies readonly RustdocItemKind[];

export function isItemKind(value: string): value is RustdocItemKind {
  return ITEM_KINDS.some(kind => kind === value);
}

/**
 * `sync::Mutex` style display path, relative to the crate
 */
export function displayItem(item: RustdocItem): string {
  return [...item.path, item.name].join('::');
}

/**
 * Location of the item's page relative to the crate's doc directory
 */
export function itemUrlPath(item: RustdocItem): string {
  const prefix = item.path.length > 0 ? `${item.path.join('/')}/` : '';
  if (item.kind === 'mod') {
    return `${prefix}${item.name}/index.html`;
  }
  return `${prefix}${item.kind}.${item.name}.html`;
}

/**
 * Re-root an item found on `parent`'s page
 */
export function nestUnder(item: RustdocItem, parent: RustdocItem | undefined): RustdocItem {
  if (!parent) {
    return item;
  }
  const base = parent.kind === 'mod' ? [...parent.path, parent.name] : parent.path;
  return { ...item, path: [...base, ...item.path] };
}
