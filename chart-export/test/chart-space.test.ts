
import { Chart, ChartConfigurationError, ChartType, Plot, StructuralMismatchError } from 'chart-base-types';
import { ChartDocumentWriter } from '../src/chart-document-writer';
import { ChartSpace } from '../src/chart-space';
import { ElementUtils, XMLDeclaration } from '../src/element-utils';
import type { ChartWriterOptions } from '../src/options';
import {
  BuildChart, CategoryData, CountingRandom, Must, SeriesName, Tags, TextAt, XyData,
} from './chart-builders';

/** write a chart and read it back */
const RoundTrip = (chart: Chart, options: ChartWriterOptions = {}) => {
  return ChartSpace.Parse(new ChartDocumentWriter(options).ToXML(chart));
};

test('root element', () => {
  expect(() => new ChartSpace(ElementUtils.Parse('<foo/>'))).toThrow('expected c:chartSpace, found foo');
});

test('properties', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.line_markers, 2));

  expect(chart_space.chart_type).toEqual(ChartType.line_markers);
  expect(chart_space.series.map(SeriesName)).toEqual(['S1', 'S2']);
  expect(chart_space.plot_groups.map(group => ElementUtils.Tag(group))).toEqual(['c:lineChart']);
  expect(ElementUtils.Tag(chart_space.plot_area)).toEqual('c:plotArea');
  expect(chart_space.date_1904).toEqual(false);

  expect(RoundTrip(BuildChart(ChartType.pie), { date_1904: true }).date_1904).toEqual(true);

});

test('no plot groups', () => {
  const chart_space = RoundTrip(BuildChart(ChartType.area));
  for (const group of chart_space.plot_groups) {
    chart_space.plot_area.remove(group);
  }
  expect(() => chart_space.chart_type).toThrow('chart has no plot groups');
});

test('axes', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.column_stacked));

  const category_axis = chart_space.CategoryAxis();
  expect(ElementUtils.Tag(category_axis)).toEqual('c:catAx');
  expect(ElementUtils.ChildValue(category_axis, 'c:axId')).toEqual('101');

  const value_axis = chart_space.ValueAxis();
  expect(ElementUtils.Tag(value_axis)).toEqual('c:valAx');
  expect(ElementUtils.ChildValue(value_axis, 'c:axId')).toEqual('102');

  expect(() => chart_space.ValueAxis(1)).toThrow('chart has no value axis at index 1');

});

test('secondary axes', () => {

  const chart = new Chart({ random: CountingRandom() });
  chart.AddPlot(new Plot(ChartType.column_clustered, CategoryData(['S1'])));
  chart.AddPlot(new Plot(ChartType.line, CategoryData(['S2']), true));

  const chart_space = RoundTrip(chart);

  // the secondary category axis is deleted, so we get the primary
  const category_axis = chart_space.CategoryAxis();
  expect(ElementUtils.ChildValue(category_axis, 'c:axId')).toEqual('101');
  expect(ElementUtils.ChildValue(category_axis, 'c:delete')).toEqual('0');

  expect(ElementUtils.ChildValue(chart_space.ValueAxis(0), 'c:axPos')).toEqual('l');
  expect(ElementUtils.ChildValue(chart_space.ValueAxis(1), 'c:axPos')).toEqual('r');

});

test('scatter axes', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.xy_scatter_lines));

  const horizontal = chart_space.CategoryAxis();
  expect(ElementUtils.Tag(horizontal)).toEqual('c:valAx');
  expect(ElementUtils.ChildValue(horizontal, 'c:axPos')).toEqual('b');

  expect(ElementUtils.ChildValue(chart_space.ValueAxis(), 'c:axPos')).toEqual('l');

});

test('no axes', () => {
  const chart_space = RoundTrip(BuildChart(ChartType.pie));
  expect(() => chart_space.CategoryAxis()).toThrow('chart has no category axis');
  expect(() => chart_space.ValueAxis()).toThrow('chart has no value axis');
});

test('legend', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.radar));
  const chart = Must(ElementUtils.Child(chart_space.root, 'c:chart'));

  expect(chart_space.has_legend).toEqual(true);

  chart_space.has_legend = false;
  expect(chart_space.has_legend).toEqual(false);
  expect(Tags(chart)).toEqual(['c:autoTitleDeleted', 'c:plotArea', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax']);

  chart_space.has_legend = true;
  expect(Tags(chart)).toEqual([
    'c:autoTitleDeleted', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax',
  ]);
  expect(ElementUtils.ChildValue(Must(ElementUtils.Child(chart, 'c:legend')), 'c:legendPos')).toEqual('r');

  // setting it again doesn't add another
  chart_space.has_legend = true;
  expect(ElementUtils.Children(chart, 'c:legend').length).toEqual(1);

});

test('replace data', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.bar_stacked, 2));
  chart_space.ReplaceData(CategoryData(['N1', 'N2', 'N3'], ['x', 'y']));

  expect(chart_space.series.map(SeriesName)).toEqual(['N1', 'N2', 'N3']);
  expect(chart_space.chart_type).toEqual(ChartType.bar_stacked);

  const before = chart_space.ToXML();
  expect(() => chart_space.ReplaceData(XyData(['P1']))).toThrow(StructuralMismatchError);
  expect(chart_space.ToXML()).toEqual(before);

});

test('replace data uses the chart epoch', () => {

  const categories = [new Date(2024, 0, 2)];

  const chart_1904 = RoundTrip(BuildChart(ChartType.line), { date_1904: true });
  chart_1904.ReplaceData(CategoryData(['N1'], categories));
  expect(TextAt(chart_1904.series[0], 'c:cat', 'c:numRef', 'c:numCache', 'c:pt', 'c:v')).toEqual('43831');

  const chart_1900 = RoundTrip(BuildChart(ChartType.line));
  chart_1900.ReplaceData(CategoryData(['N1'], categories));
  expect(TextAt(chart_1900.series[0], 'c:cat', 'c:numRef', 'c:numCache', 'c:pt', 'c:v')).toEqual('45293');

});

test('xml', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.doughnut));

  expect(chart_space.ToXML().startsWith(XMLDeclaration + '<c:chartSpace ')).toEqual(true);
  expect(chart_space.ToXML(false).startsWith('<c:chartSpace ')).toEqual(true);

  const again = ChartSpace.Parse(chart_space.ToXML());
  expect(again.chart_type).toEqual(ChartType.doughnut);

});

test('chart style', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.column_clustered));
  expect(chart_space.chart_style).toBeUndefined();

  chart_space.chart_style = 12;
  expect(chart_space.chart_style).toEqual(12);
  expect(Tags(chart_space.root)).toEqual(['c:date1904', 'c:roundedCorners', 'c:style', 'c:chart', 'c:spPr', 'c:txPr']);

  chart_space.chart_style = 20;
  expect(ElementUtils.Children(chart_space.root, 'c:style').length).toEqual(1);
  expect(ElementUtils.ChildValue(chart_space.root, 'c:style')).toEqual('20');

  expect(() => { chart_space.chart_style = 0; }).toThrow('chart style must be an integer from 1 to 48: 0');
  expect(() => { chart_space.chart_style = 2.5; }).toThrow(ChartConfigurationError);
  expect(chart_space.chart_style).toEqual(20);

  chart_space.chart_style = undefined;
  expect(chart_space.chart_style).toBeUndefined();
  expect(Tags(chart_space.root)).toEqual(['c:date1904', 'c:roundedCorners', 'c:chart', 'c:spPr', 'c:txPr']);

});

test('title', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.line));
  const chart = Must(ElementUtils.Child(chart_space.root, 'c:chart'));

  expect(chart_space.has_title).toEqual(false);

  chart_space.has_title = true;
  expect(chart_space.has_title).toEqual(true);
  expect(Tags(chart)).toEqual([
    'c:title', 'c:autoTitleDeleted', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax',
  ]);
  expect(Tags(ElementUtils.Child(chart, 'c:title'))).toEqual(['c:layout', 'c:overlay']);

  // already there
  chart_space.has_title = true;
  expect(ElementUtils.Children(chart, 'c:title').length).toEqual(1);

  chart_space.has_title = false;
  expect(chart_space.has_title).toEqual(false);
  expect(Tags(chart)).toEqual([
    'c:autoTitleDeleted', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax',
  ]);
  expect(ElementUtils.ChildValue(chart, 'c:autoTitleDeleted')).toEqual('1');

});

test('removing a title adds autoTitleDeleted', () => {

  const chart_space = RoundTrip(BuildChart(ChartType.pie));
  const chart = Must(ElementUtils.Child(chart_space.root, 'c:chart'));
  ElementUtils.RemoveChildren(chart, 'c:autoTitleDeleted');
  chart_space.has_title = true;

  chart_space.has_title = false;
  expect(Tags(chart)).toEqual([
    'c:autoTitleDeleted', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax',
  ]);
  expect(ElementUtils.ChildValue(chart, 'c:autoTitleDeleted')).toEqual('1');

});
