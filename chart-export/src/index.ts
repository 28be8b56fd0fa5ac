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


export * from './element-utils';
export * from './options';
export * from './series-writer';
export * from './axes-writer';
export * from './plot/plot-writer';
export * from './plot/area-plot';
export * from './plot/bar-plot';
export * from './plot/line-plot';
export * from './plot/pie-plot';
export * from './plot/doughnut-plot';
export * from './plot/radar-plot';
export * from './plot/xy-plot';
export * from './plot/bubble-plot';
export * from './plot/plot-writers';
export * from './chart-document-writer';
export * from './plot-area';
export * from './series-reconciler';
export * from './plot-type-inspector';
export * from './chart-space';
export * from './chart-reader';
export * from './chart-package';
