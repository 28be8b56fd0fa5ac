/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */


import * as ElementTree from 'elementtree';
import { Element, ElementTree as Tree } from 'elementtree';

export const XMLDeclaration = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n`;

export const Namespaces = {
  c: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
};

export type AttributeValue = string | number | boolean;
export type AttributeMap = Record<string, AttributeValue | undefined>;

/** booleans are written 1/0 */
export const BoolVal = (value: boolean): string => value ? '1' : '0';

/** attribute map -> strings, dropping undefined */
const Stringify = (attributes: AttributeMap): Record<string, string> => {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      result[key] = (typeof value === 'boolean') ? BoolVal(value) : String(value);
    }
  }
  return result;
};

/**
 * element construction and lookup on top of elementtree. tags are kept
 * with their prefixes (c:ser, a:ln); we don't resolve namespaces, the
 * chart vocabulary always uses the same prefixes.
 */
export class ElementUtils {

  /** create a detached element */
  public static Create(tag: string, attributes: AttributeMap = {}): Element {
    return Element(tag, Stringify(attributes));
  }

  /** create and append */
  public static Add(parent: Element, tag: string, attributes: AttributeMap = {}): Element {
    return ElementTree.SubElement(parent, tag, Stringify(attributes));
  }

  /** create and append an element like <c:grouping val="stacked"/> */
  public static AddValue(parent: Element, tag: string, value: AttributeValue): Element {
    return this.Add(parent, tag, { val: value });
  }

  /** create and append an element with text content */
  public static AddText(parent: Element, tag: string, text: string): Element {
    const element = this.Add(parent, tag);
    element.text = text;
    return element;
  }

  /** create and append a chain of single children, return the last one */
  public static AddPath(parent: Element, ...tags: string[]): Element {
    let element = parent;
    for (const tag of tags) {
      element = this.Add(element, tag);
    }
    return element;
  }

  public static Tag(element: Element): string {
    return String(element.tag);
  }

  /** direct children, optionally filtered by tag */
  public static Children(element: Element, tag?: string): Element[] {
    return element.getchildren().filter(child => tag === undefined || this.Tag(child) === tag);
  }

  public static Child(element: Element, tag: string): Element | undefined {
    return element.getchildren().find(child => this.Tag(child) === tag);
  }

  /** walk down a chain of first children */
  public static Descend(element: Element, ...tags: string[]): Element | undefined {
    let current: Element | undefined = element;
    for (const tag of tags) {
      if (!current) { return undefined; }
      current = this.Child(current, tag);
    }
    return current;
  }

  public static Attribute(element: Element, name: string): string | undefined {
    const value = element.attrib[name];
    return value === undefined ? undefined : String(value);
  }

  /** val attribute of the named child, if both exist */
  public static ChildValue(element: Element, tag: string): string | undefined {
    const child = this.Child(element, tag);
    return child ? this.Attribute(child, 'val') : undefined;
  }

  public static SetAttribute(element: Element, name: string, value: AttributeValue): void {
    element.attrib[name] = (typeof value === 'boolean') ? BoolVal(value) : String(value);
  }

  public static Text(element: Element): string {
    const text = element.text;
    if (text === undefined || text === null) {
      return '';
    }
    return String(text);
  }

  /**
   * deep copy. tags, attributes, text and tails are copied; nothing is
   * shared with the source, so the copy can be edited freely.
   */
  public static Clone(source: Element): Element {
    const clone = Element(this.Tag(source), { ...source.attrib });
    clone.text = source.text;
    clone.tail = source.tail;
    for (const child of source.getchildren()) {
      clone.append(this.Clone(child));
    }
    return clone;
  }

  /**
   * insert at a position in the child list. Element.insert replaces the
   * child at that index, so we splice the list instead; getchildren()
   * returns the element's own list, not a copy.
   */
  public static Insert(parent: Element, index: number, element: Element): void {
    parent.getchildren().splice(index, 0, element);
  }

  /** insert immediately after sibling (which must be a child of parent) */
  public static InsertAfter(parent: Element, sibling: Element, element: Element): void {
    const index = parent.getchildren().indexOf(sibling);
    this.Insert(parent, index + 1, element);
  }

  /**
   * insert child in schema order: before the first existing child whose
   * tag is one of the successors, or at the end.
   */
  public static InsertBefore(parent: Element, element: Element, successors: readonly string[]): void {
    const children = parent.getchildren();
    const index = children.findIndex(child => successors.includes(this.Tag(child)));
    if (index < 0) {
      parent.append(element);
    }
    else {
      this.Insert(parent, index, element);
    }
  }

  /** remove every child with this tag */
  public static RemoveChildren(parent: Element, tag: string): void {
    for (const child of this.Children(parent, tag)) {
      parent.remove(child);
    }
  }

  public static Parse(xml: string): Tree {
    return ElementTree.parse(xml);
  }

  public static Serialize(root: Element, declaration = true): string {
    return (declaration ? XMLDeclaration : '') + new Tree(root).write({ xml_declaration: false });
  }

}
