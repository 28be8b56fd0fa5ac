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


import JSZip from 'jszip';
import { ChartConfigurationError, type Chart, type ChartData } from 'chart-base-types';
import { ChartSpace } from './chart-space';
import { ChartDocumentWriter } from './chart-document-writer';
import type { ChartWriterOptions } from './options';

/**
 * the chart part only holds a cache of the data. if the document also
 * embeds a workbook with the real data, something has to update that;
 * we don't write spreadsheets here.
 */
export interface ChartWorkbookUpdater {
  UpdateWorkbook(chart_path: string, data: ChartData, zip: JSZip): Promise<void>;
}

/** chart parts in an office document */
const ChartPartPattern = /(^|\/)charts\/chart\d+\.xml$/;

/**
 * read and write chart parts in an office document (xlsx, docx, pptx),
 * which is a zip file.
 */
export class ChartPackage {

  constructor(public readonly zip: JSZip = new JSZip()) {
  }

  public static async Load(data: Uint8Array|ArrayBuffer): Promise<ChartPackage> {
    return new ChartPackage(await new JSZip().loadAsync(data));
  }

  /** paths of chart parts, sorted */
  public get chart_paths(): string[] {
    return Object.keys(this.zip.files)
      .filter(path => ChartPartPattern.test(path) && !this.zip.files[path].dir)
      .sort();
  }

  public async ReadChart(path: string): Promise<ChartSpace> {
    const file = this.zip.file(path);
    if (!file) {
      throw new ChartConfigurationError(`no chart part at ${path}`);
    }
    return ChartSpace.Parse(await file.async('string'));
  }

  /**
   * write a chart part. pass an edited ChartSpace to save it, or a Chart
   * to write a new document.
   */
  public async WriteChart(path: string, chart: ChartSpace|Chart, options: ChartWriterOptions = {}): Promise<void> {
    const xml = (chart instanceof ChartSpace) ?
      chart.ToXML(options.xml_declaration ?? true) :
      new ChartDocumentWriter(options).ToXML(chart);
    this.zip.file(path, xml);
  }

  /**
   * replace the data in an existing chart, keeping its formatting, and
   * save it back.
   */
  public async ReplaceData(path: string, data: ChartData, workbook?: ChartWorkbookUpdater): Promise<ChartSpace> {

    const chart_space = await this.ReadChart(path);
    chart_space.ReplaceData(data);
    await this.WriteChart(path, chart_space);

    if (workbook) {
      await workbook.UpdateWorkbook(path, data, this.zip);
    }
    else {
      console.warn('no workbook updater; chart cache updated but embedded workbook was not', path);
    }

    return chart_space;

  }

  public async Generate(): Promise<Uint8Array> {
    return this.zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  }

}
