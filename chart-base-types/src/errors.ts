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


/**
 * base class for everything the chart model and writers throw. callers
 * that only care whether a chart operation failed can catch this one.
 */
export class ChartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * caller-input problems: empty charts, mixed axis presence, data that
 * doesn't fit the chart type, axes that don't exist. not retryable.
 */
export class ChartConfigurationError extends ChartError {}

/**
 * a chart type (or plot-group element) with no catalog, writer or
 * reconciler entry. if you see this for a value in the ChartType enum,
 * one of the dispatch tables is out of date.
 */
export class UnsupportedChartTypeError extends ChartError {
  constructor(public chart_type: string, context = 'chart type') {
    super(`unsupported ${context}: ${chart_type}`);
  }
}

/**
 * series data whose shape (category, xy, bubble) doesn't match the
 * plot groups in an existing chart. use a different reconciler, or
 * write a new chart.
 */
export class StructuralMismatchError extends ChartError {
  constructor(public expected: string, public found: string) {
    super(`series shape mismatch: expected ${expected}, found ${found}`);
  }
}
