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


import { type X2jOptions, XMLParser } from 'fast-xml-parser';

export const attrs = Symbol('attrs');
export const text = Symbol('text');

export interface XMLNode {
  [attrs]?: Record<string, string>;
  [text]?: string;
  [index: string]: XMLNode|XMLNode[];
}

/**
 * tags that can repeat in a chart part. forcing these to arrays means
 * we don't have to check every time.
 */
const ArrayTags = /^c:(ser|pt|lvl|\w+Chart|valAx|catAx|dateAx|serAx)$/;

/**
 * group attributes under `a$`, and don't add attribute prefixes. values
 * are left as strings; we convert the ones we want.
 */
const XMLOptions: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributesGroupName: 'a$',
  attributeNamePrefix: '',
  textNodeName: 't$',
  trimValues: false,
  ignoreDeclaration: true,
  alwaysCreateTextNode: true,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tag_name: string) => ArrayTags.test(tag_name),
};

const TranslateAttributes = (value: unknown): Record<string, string> => {
  const result: Record<string, string> = {};
  if (value && typeof value === 'object') {
    for (const [key, entry] of Object.entries(value)) {
      result[key] = String(entry);
    }
  }
  return result;
};

/**
 * convert string names to symbols and retype. elements with no children
 * or attributes come back from the parser as bare values, so those are
 * wrapped.
 */
const Translate = (parsed: unknown): XMLNode => {

  const translated: XMLNode = {};

  if (typeof parsed === 'string' || typeof parsed === 'number' || typeof parsed === 'boolean') {
    translated[text] = String(parsed);
    return translated;
  }

  if (!parsed || typeof parsed !== 'object') {
    return translated;
  }

  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'a$':
        translated[attrs] = TranslateAttributes(value);
        break;
      case 't$':
        translated[text] = String(value);
        break;
      default:
        if (Array.isArray(value)) {
          translated[key] = value.map(entry => Translate(entry));
        }
        else {
          translated[key] = Translate(value);
        }
    }
  }

  return translated;

};

const internal_parser = new XMLParser(XMLOptions);

export const default_parser = {
  parse: (xml: string): XMLNode => Translate(internal_parser.parse(xml)),
};

/**
 * some utility functions for working with the objects we get from
 * fast-xml-parser.
 */
export class XMLUtils {

  /**
   * find every element matching a path, where any step in the path could
   * be an array. for example, the path a/b/c could be reflected in xml as
   *
   * <a><b><c/><c/></b></a>
   *
   * or
   *
   * <a><b><c/></b><b><c/></b></a>
   *
   * in either case we want both "c" elements. "*" matches any child
   * element.
   */
  public static FindAll(root: XMLNode|XMLNode[] = {}, path: string): XMLNode[] {

    const components = path.split('/');

    // allow proper paths starting with ./
    if (components[0] === '.') {
      components.shift();
    }

    if (components[0] === '..' || components[0] === '') {
      throw new Error(`invalid path: ${path}`);
    }

    return this.FindAllTail(root, components);

  }

  /** first match, or undefined */
  public static Find(root: XMLNode|XMLNode[] | undefined, path: string): XMLNode|undefined {
    return root ? this.FindAll(root, path)[0] : undefined;
  }

  public static Attribute(node: XMLNode|undefined, name: string): string|undefined {
    return node?.[attrs]?.[name];
  }

  public static Text(node: XMLNode|undefined): string {
    return node?.[text] ?? '';
  }

  /** child element names, in the order the parser saw them */
  public static ChildNames(node: XMLNode): string[] {
    return Object.keys(node);
  }

  protected static FindAllTail(root: XMLNode|XMLNode[], elements: string[]): XMLNode[] {

    if (Array.isArray(root)) {
      return root.reduce<XMLNode[]>((composite, element) => {
        return composite.concat(this.FindAllTail(element, elements));
      }, []);
    }

    if (!elements.length) {
      return [root];
    }

    const [element, ...rest] = elements;
    let next: Array<XMLNode|XMLNode[]>;

    if (element === '*') {
      next = Object.values(root);
    }
    else {
      const child = root[element];
      next = child ? [child] : [];
    }

    return next.reduce<XMLNode[]>((composite, entry) => {
      return composite.concat(this.FindAllTail(entry, rest));
    }, []);

  }

}
