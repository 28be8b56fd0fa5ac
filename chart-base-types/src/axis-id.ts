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

/** ids are 24-bit, like the ones the host application writes */
export const AxisIdLimit = 0x1000000;

export type RandomSource = () => number;

/** draws before we give up on a random source that keeps repeating */
const MaxDraws = 1000;

const DefaultRandom: RandomSource = () => Math.floor(Math.random() * AxisIdLimit);

/**
 * hands out random 24-bit axis ids, redrawing until the id is not one
 * this allocator has already used. ids found in a document being edited
 * can be added with Reserve().
 *
 * the random source should return an integer in [0, 2^24); anything else
 * is truncated into that range.
 */
export class AxisIdAllocator {

  private readonly used = new Set<number>();

  constructor(private readonly random: RandomSource = DefaultRandom) {
  }

  public Next(): number {
    for (let i = 0; i < MaxDraws; i++) {
      const id = Math.abs(Math.trunc(this.random())) % AxisIdLimit;
      if (!this.used.has(id)) {
        this.used.add(id);
        return id;
      }
    }
    throw new ChartConfigurationError(`no unused axis id after ${MaxDraws} draws`);
  }

  public Reserve(...ids: number[]): void {
    for (const id of ids) {
      this.used.add(id);
    }
  }

  public Has(id: number): boolean {
    return this.used.has(id);
  }

}
