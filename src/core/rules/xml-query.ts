/**
 * Path-style lookups over the extracted element tree.
 */
import type { XmlElement } from '../facts/types.js';
import { descendantsAndSelf } from '../../validators/xml.js';

export const DATA_ROOTS: ReadonlySet<string> = new Set(['odoo', 'openerp']);

export function attr(element: XmlElement, name: string): string | undefined {
  return Object.hasOwn(element.attributes, name) ? element.attributes[name] : undefined;
}

export function hasAttr(element: XmlElement, name: string): boolean {
  return Object.hasOwn(element.attributes, name);
}

/** Direct children, optionally filtered by tag name. */
export function children(element: XmlElement, name?: string): XmlElement[] {
  return name === undefined
    ? element.children
    : element.children.filter((child) => child.name === name);
}

/** `field[@name='x']` children. */
export function fieldsNamed(element: XmlElement, ...names: string[]): XmlElement[] {
  return children(element, 'field').filter((child) => {
    const value = attr(child, 'name');
    return value !== undefined && names.includes(value);
  });
}

/** All descendants in document order, the element itself excluded. */
export function descendants(element: XmlElement): XmlElement[] {
  return descendantsAndSelf(element).slice(1);
}

/** `/odoo//record[@id] | /openerp//record[@id]` */
export function dataRecords(root: XmlElement): XmlElement[] {
  if (!DATA_ROOTS.has(root.name)) return [];
  return descendants(root).filter((el) => el.name === 'record' && hasAttr(el, 'id'));
}

/**
 * Leading integer value, as `int()` reads it; null when the text is not an integer.
 */
export function parseInteger(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return /^[-+]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}
