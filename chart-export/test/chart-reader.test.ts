
import { CategoryChartData, ChartConfigurationError, ChartType, Chart, Plot } from 'chart-base-types';
import { ChartDocumentWriter } from '../src/chart-document-writer';
import { ReadChartData } from '../src/chart-reader';
import { BuildChart, CountingRandom } from './chart-builders';

const Write = (chart: Chart) => new ChartDocumentWriter().ToXML(chart);

/** single-plot chart from category data */
const WriteData = (data: CategoryChartData) => {
  const chart = new Chart({ random: CountingRandom() });
  chart.AddPlot(new Plot(ChartType.line, data));
  return Write(chart);
};

const PlotArea = (body: string) => `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<c:chartSpace xmlns:c="http://schemas.openxmlformats.org/drawingml/2006/chart">
  <c:chart><c:plotArea><c:layout/>${body}</c:plotArea></c:chart>
</c:chartSpace>`;

const Ser = (order: number, name: string, value: number) => {
  return `<c:ser><c:idx val="${order}"/><c:order val="${order}"/><c:tx><c:v>${name}</c:v></c:tx>` +
    `<c:val><c:numLit><c:ptCount val="1"/><c:pt idx="0"><c:v>${value}</c:v></c:pt></c:numLit></c:val></c:ser>`;
};

test('category series', () => {

  const groups = ReadChartData(Write(BuildChart(ChartType.column_clustered, 2)));

  expect(groups.length).toEqual(1);
  expect(groups[0].tag).toEqual('c:barChart');
  expect(groups[0].series).toEqual([
    { index: 0, order: 0, name: 'S1', categories: ['a', 'b', 'c'], values: [10, 11, 12], point_count: 3 },
    { index: 1, order: 1, name: 'S2', categories: ['a', 'b', 'c'], values: [20, 21, 22], point_count: 3 },
  ]);

});

test('missing points', () => {

  const data = new CategoryChartData(['a', 'b', 'c']);
  data.AddSeries('S1', [10, null, 30]);

  const [series] = ReadChartData(WriteData(data))[0].series;
  expect(series.values).toEqual([10, undefined, 30]);
  expect(series.point_count).toEqual(3);

});

test('multi-level categories read leaf labels', () => {

  const data = new CategoryChartData([['Q1', 'Jan'], ['Q1', 'Feb'], ['Q2', 'Mar']]);
  data.AddSeries('S1', [1, 2, 3]);

  const [series] = ReadChartData(WriteData(data))[0].series;
  expect(series.categories).toEqual(['Jan', 'Feb', 'Mar']);

});

test('escaped text', () => {

  const data = new CategoryChartData(['a']);
  data.AddSeries('R&D <east>', [1]);

  const [series] = ReadChartData(WriteData(data))[0].series;
  expect(series.name).toEqual('R&D <east>');

});

test('scatter and bubble', () => {

  const [scatter] = ReadChartData(Write(BuildChart(ChartType.xy_scatter, 2)));
  expect(scatter.tag).toEqual('c:scatterChart');
  expect(scatter.series[1].x_values).toEqual([1, 2]);
  expect(scatter.series[1].values).toEqual([1, 2]);
  expect(scatter.series[1].categories).toEqual([]);
  expect(scatter.series[1].bubble_sizes).toBeUndefined();

  const [bubble] = ReadChartData(Write(BuildChart(ChartType.bubble)));
  expect(bubble.series[0].x_values).toEqual([1, 2]);
  expect(bubble.series[0].values).toEqual([0, 1]);
  expect(bubble.series[0].bubble_sizes).toEqual([5, 10]);

});

test('literal caches and display order', () => {

  const [group] = ReadChartData(PlotArea(`<c:lineChart>${Ser(1, 'Second', 2)}${Ser(0, 'First', 1)}</c:lineChart>`));

  expect(group.series.map(series => series.name)).toEqual(['First', 'Second']);
  expect(group.series.map(series => series.values)).toEqual([[1], [2]]);

});

test('groups are collected by tag', () => {

  const xml = PlotArea(
    `<c:barChart>${Ser(0, 'A', 1)}</c:barChart>` +
    `<c:lineChart>${Ser(1, 'B', 2)}</c:lineChart>` +
    `<c:barChart>${Ser(2, 'C', 3)}</c:barChart>`);

  const groups = ReadChartData(xml);
  expect(groups.map(group => group.tag)).toEqual(['c:barChart', 'c:barChart', 'c:lineChart']);
  expect(groups.map(group => group.series[0].name)).toEqual(['A', 'C', 'B']);

});

test('unsupported groups are skipped', () => {

  const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

  const groups = ReadChartData(PlotArea(
    `<c:bar3DChart>${Ser(0, 'A', 1)}</c:bar3DChart>` +
    `<c:lineChart>${Ser(1, 'B', 2)}</c:lineChart>`));

  expect(groups.map(group => group.tag)).toEqual(['c:lineChart']);
  expect(warn).toHaveBeenCalledWith('skipping unsupported plot group', 'c:bar3DChart');

  warn.mockRestore();

});

test('no plot area', () => {
  const xml = '<c:chartSpace xmlns:c="http://schemas.openxmlformats.org/drawingml/2006/chart"><c:chart/></c:chartSpace>';
  expect(() => ReadChartData(xml)).toThrow(ChartConfigurationError);
  expect(() => ReadChartData(xml)).toThrow('no plot area in chart');
});
