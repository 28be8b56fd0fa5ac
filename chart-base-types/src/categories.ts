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


import { ChartConfigurationError } from './errors';
import { CalendarLabel, DateSerial } from './date-serial';

/** a single category label */
export type CategoryLabel = string | number | Date;

/**
 * one category as passed in: either a flat label, or for multi-level
 * axes a tuple of labels, most significant first (e.g. ['Q1', 'Jan']).
 */
export type CategoryInput = CategoryLabel | Array<string | number>;

export type CategoryKind = 'string' | 'number' | 'date' | 'multi_level';

/** one level of a multi-level axis: [leaf index, label] pairs */
export type CategoryLevel = Array<[number, string]>;

export interface CategoriesOptions {

  /**
   * number format for numeric or date categories. defaults to General
   * for numbers and an ISO-style date format for dates.
   */
  number_format?: string;

}

export const DefaultDateFormat = 'yyyy\\-mm\\-dd';

const LabelKind = (label: CategoryLabel): CategoryKind => {
  if (label instanceof Date) { return 'date'; }
  if (typeof label === 'number') { return 'number'; }
  return 'string';
};

/**
 * ordered category labels for a category-shaped chart. all entries share
 * one kind, and if multi-level, one depth.
 */
export class Categories {

  public readonly kind: CategoryKind;
  public readonly depth: number;
  public readonly number_format: string;

  /** flat labels, for string/number/date kinds */
  private readonly flat: CategoryLabel[] = [];

  /** tuples, for multi-level */
  private readonly tuples: string[][] = [];

  constructor(labels: CategoryInput[] = [], options: CategoriesOptions = {}) {

    const tuple_count = labels.filter(label => Array.isArray(label)).length;

    if (tuple_count && tuple_count !== labels.length) {
      throw new ChartConfigurationError('can\'t mix multi-level and flat categories');
    }

    if (tuple_count) {

      const depth = labels.reduce((result: number, label) => Math.max(result, Array.isArray(label) ? label.length : 0), 0);

      for (const label of labels) {
        if (!Array.isArray(label) || label.length !== depth || depth === 0) {
          throw new ChartConfigurationError('multi-level categories must all have the same depth');
        }
        this.tuples.push(label.map(entry => String(entry)));
      }

      if (depth === 1) {

        // a one-level tuple is just a label. unwrap and treat as strings.
        this.flat = this.tuples.map(tuple => tuple[0]);
        this.tuples = [];
        this.kind = 'string';
        this.depth = 1;

      }
      else {
        this.kind = 'multi_level';
        this.depth = depth;
      }

    }
    else {

      let kind: CategoryKind = 'string';

      for (const [index, label] of labels.entries()) {
        if (Array.isArray(label)) { continue; } // can't happen, see above
        const label_kind = LabelKind(label);
        if (index === 0) {
          kind = label_kind;
        }
        else if (label_kind !== kind) {
          throw new ChartConfigurationError(`mixed category types (${kind}, ${label_kind})`);
        }
        if (label_kind === 'number' && !Number.isFinite(label)) {
          throw new ChartConfigurationError(`invalid numeric category at index ${index}`);
        }
        if (label instanceof Date && isNaN(label.getTime())) {
          throw new ChartConfigurationError(`invalid date category at index ${index}`);
        }
        this.flat.push(label);
      }

      this.kind = kind;
      this.depth = 1;

    }

    this.number_format = options.number_format ||
      (this.kind === 'date' ? DefaultDateFormat : 'General');

  }

  /** number of leaf categories (points along the axis) */
  public get leaf_count(): number {
    return this.kind === 'multi_level' ? this.tuples.length : this.flat.length;
  }

  public get length(): number {
    return this.leaf_count;
  }

  /** numbers and dates are both written as numeric caches */
  public get are_numeric(): boolean {
    return this.kind === 'number' || this.kind === 'date';
  }

  public get are_dates(): boolean {
    return this.kind === 'date';
  }

  /**
   * display label for a leaf. for multi-level categories this is the
   * leaf label; for dates it's the ISO date.
   */
  public Label(index: number): string {
    if (this.kind === 'multi_level') {
      return this.tuples[index][this.depth - 1];
    }
    const label = this.flat[index];
    if (label instanceof Date) {
      return CalendarLabel(label);
    }
    return String(label);
  }

  /**
   * the cached value for numeric and date categories. dates become
   * serial day numbers in whichever epoch the chart uses.
   */
  public NumericText(index: number, date_1904 = false): string {
    const label = this.flat[index];
    if (label instanceof Date) {
      return String(DateSerial(label, date_1904));
    }
    return String(label);
  }

  /**
   * levels for a multi-level axis, leaf level first. a parent label
   * appears once, at the index of the first leaf it covers.
   */
  public get levels(): CategoryLevel[] {

    const levels: CategoryLevel[] = [];

    for (let level = 0; level < this.depth; level++) {

      const position = this.depth - 1 - level;
      const entries: CategoryLevel = [];

      for (let index = 0; index < this.leaf_count; index++) {
        const labels = this.kind === 'multi_level' ? this.tuples[index] : [this.Label(index)];
        if (level === 0 || index === 0 || !this.SamePrefix(index - 1, index, position)) {
          entries.push([index, labels[position]]);
        }
      }

      levels.push(entries);

    }

    return levels;

  }

  /** compare tuples a and b up to and including position */
  private SamePrefix(a: number, b: number, position: number): boolean {
    for (let i = 0; i <= position; i++) {
      if (this.tuples[a][i] !== this.tuples[b][i]) {
        return false;
      }
    }
    return true;
  }

}
