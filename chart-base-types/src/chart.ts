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


import { AxisIdAllocator, type RandomSource } from './axis-id';
import type { Categories } from './categories';
import type { DataShape } from './chart-type';
import { ChartConfigurationError } from './errors';
import type { Plot } from './plot';

export interface ChartOptions {

  /** random source for axis ids. mostly for tests. */
  random?: RandomSource;

  /** ids already in use (e.g. in a document being edited) */
  reserved_axis_ids?: number[];

}

/**
 * one or more plots sharing a plot area. plots are drawn in order, so
 * earlier plots are behind later ones.
 *
 * axis ids: the primary pair is allocated up front. the secondary pair
 * is allocated when the first secondary-axis plot is added, and every
 * secondary plot after that shares it.
 */
export class Chart {

  public readonly x_axis_id: number;
  public readonly y_axis_id: number;

  public secondary_x_axis_id?: number;
  public secondary_y_axis_id?: number;

  private readonly plot_list: Plot[] = [];
  private readonly allocator: AxisIdAllocator;

  constructor(options: ChartOptions = {}) {
    this.allocator = new AxisIdAllocator(options.random);
    this.allocator.Reserve(...(options.reserved_axis_ids || []));
    this.x_axis_id = this.allocator.Next();
    this.y_axis_id = this.allocator.Next();
  }

  public get plots(): readonly Plot[] {
    return this.plot_list;
  }

  /**
   * true if the plots use axes. all plots must agree, so we check the
   * first one. an empty chart has no axes.
   */
  public get has_axes(): boolean {
    return this.plot_list.length > 0 && this.plot_list[0].has_axes;
  }

  /** data shape of the first plot */
  public get data_shape(): DataShape | undefined {
    return this.plot_list[0]?.data.shape;
  }

  /**
   * categories from the first category-shaped plot. the axes writer
   * uses this to decide between a category axis and a date axis.
   */
  public get categories(): Categories | undefined {
    for (const plot of this.plot_list) {
      if (plot.data.shape === 'category') {
        return plot.data.categories;
      }
    }
    return undefined;
  }

  /** true once a secondary-axis plot has been added */
  public get has_secondary_axes(): boolean {
    return this.secondary_x_axis_id !== undefined;
  }

  public AddPlot(plot: Plot): this {

    if (this.plot_list.length > 0 && this.has_axes !== plot.has_axes) {
      throw new ChartConfigurationError('can\'t mix a plot with and without axes');
    }

    if (plot.has_axes) {

      // a category axis can't carry scatter points, and a value axis
      // has no categories, so plots on one pair share a data shape
      const neighbor = this.plot_list.find(entry => entry.secondary_axis === plot.secondary_axis);
      if (neighbor && neighbor.data.shape !== plot.data.shape) {
        throw new ChartConfigurationError(
          `can't mix ${neighbor.data.shape} and ${plot.data.shape} plots on the same axes`);
      }

      if (plot.secondary_axis) {

        if (this.secondary_x_axis_id === undefined || this.secondary_y_axis_id === undefined) {
          this.secondary_x_axis_id = this.allocator.Next();
          this.secondary_y_axis_id = this.allocator.Next();
        }

        plot.x_axis_id = this.secondary_x_axis_id;
        plot.y_axis_id = this.secondary_y_axis_id;

      }
      else {
        plot.x_axis_id = this.x_axis_id;
        plot.y_axis_id = this.y_axis_id;
      }

    }

    this.plot_list.push(plot);
    return this;

  }

}
