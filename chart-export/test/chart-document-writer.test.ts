
import { Chart, ChartConfigurationError, ChartType, Plot } from 'chart-base-types';
import { ChartDocumentWriter } from '../src/chart-document-writer';
import { ElementUtils, Namespaces, XMLDeclaration } from '../src/element-utils';
import { BuildChart, CategoryData, CountingRandom, Must, Tags, TextAt } from './chart-builders';

test('empty chart', () => {

  expect(() => new ChartDocumentWriter().Render(new Chart())).toThrow(ChartConfigurationError);
  expect(() => new ChartDocumentWriter().ToXML(new Chart())).toThrow('chart has no plots');

});

test('document structure', () => {

  const root = new ChartDocumentWriter().Render(BuildChart(ChartType.column_clustered)).getroot();

  expect(ElementUtils.Tag(root)).toEqual('c:chartSpace');
  expect(ElementUtils.Attribute(root, 'xmlns:c')).toEqual(Namespaces.c);
  expect(ElementUtils.Attribute(root, 'xmlns:a')).toEqual(Namespaces.a);
  expect(ElementUtils.Attribute(root, 'xmlns:r')).toEqual(Namespaces.r);

  expect(Tags(root)).toEqual(['c:date1904', 'c:roundedCorners', 'c:chart', 'c:spPr', 'c:txPr']);
  expect(ElementUtils.ChildValue(root, 'c:date1904')).toEqual('0');
  expect(ElementUtils.ChildValue(root, 'c:roundedCorners')).toEqual('0');

  const chart = Must(ElementUtils.Child(root, 'c:chart'));
  expect(Tags(chart)).toEqual([
    'c:autoTitleDeleted', 'c:plotArea', 'c:legend', 'c:plotVisOnly', 'c:dispBlanksAs', 'c:showDLblsOverMax',
  ]);
  expect(ElementUtils.ChildValue(chart, 'c:autoTitleDeleted')).toEqual('1');
  expect(ElementUtils.ChildValue(chart, 'c:dispBlanksAs')).toEqual('gap');

  const legend = Must(ElementUtils.Child(chart, 'c:legend'));
  expect(Tags(legend)).toEqual(['c:legendPos', 'c:layout', 'c:overlay']);
  expect(ElementUtils.ChildValue(legend, 'c:legendPos')).toEqual('r');

  expect(Tags(ElementUtils.Child(chart, 'c:plotArea'))).toEqual(['c:layout', 'c:barChart', 'c:valAx', 'c:catAx']);

  expect(Tags(ElementUtils.Child(root, 'c:spPr'))).toEqual(['a:noFill', 'a:ln', 'a:effectLst']);

  const txpr = Must(ElementUtils.Child(root, 'c:txPr'));
  expect(Tags(txpr)).toEqual(['a:bodyPr', 'a:lstStyle', 'a:p']);
  const end = Must(ElementUtils.Descend(txpr, 'a:p', 'a:endParaRPr'));
  expect(ElementUtils.Attribute(end, 'lang')).toEqual('en-US');

});

test('options', () => {

  const writer = new ChartDocumentWriter({
    date_1904: true,
    rounded_corners: true,
    legend_position: 'b',
    lang: 'de-DE',
  });

  const chart = new Chart({ random: CountingRandom() });
  chart.AddPlot(new Plot(ChartType.line, CategoryData(['S1'], [new Date(2024, 0, 1)])));

  const root = writer.Render(chart).getroot();
  expect(ElementUtils.ChildValue(root, 'c:date1904')).toEqual('1');
  expect(ElementUtils.ChildValue(root, 'c:roundedCorners')).toEqual('1');
  expect(ElementUtils.ChildValue(Must(ElementUtils.Descend(root, 'c:chart', 'c:legend')), 'c:legendPos')).toEqual('b');
  expect(ElementUtils.Attribute(Must(ElementUtils.Descend(root, 'c:txPr', 'a:p', 'a:endParaRPr')), 'lang')).toEqual('de-DE');

  // date categories use the 1904 epoch
  const ser = Must(ElementUtils.Descend(root, 'c:chart', 'c:plotArea', 'c:lineChart', 'c:ser'));
  expect(TextAt(ser, 'c:cat', 'c:numRef', 'c:numCache', 'c:pt', 'c:v')).toEqual('43830');

  const no_legend = new ChartDocumentWriter({ legend: false }).Render(chart).getroot();
  expect(ElementUtils.Descend(no_legend, 'c:chart', 'c:legend')).toBeUndefined();

});

test('no axes', () => {

  const root = new ChartDocumentWriter().Render(BuildChart(ChartType.doughnut)).getroot();
  expect(Tags(ElementUtils.Descend(root, 'c:chart', 'c:plotArea'))).toEqual(['c:layout', 'c:doughnutChart']);

});

test('combination chart', () => {

  const chart = new Chart({ random: CountingRandom() });
  chart.AddPlot(new Plot(ChartType.column_clustered, CategoryData(['Sales'])));
  chart.AddPlot(new Plot(ChartType.line_markers, CategoryData(['Margin']), true));

  const root = new ChartDocumentWriter().Render(chart).getroot();
  const plot_area = Must(ElementUtils.Descend(root, 'c:chart', 'c:plotArea'));

  expect(Tags(plot_area)).toEqual([
    'c:layout', 'c:barChart', 'c:lineChart', 'c:valAx', 'c:catAx', 'c:valAx', 'c:catAx',
  ]);

  const axis_ids = (tag: string) => ElementUtils.Children(Must(ElementUtils.Child(plot_area, tag)), 'c:axId')
    .map(element => ElementUtils.Attribute(element, 'val'));

  expect(axis_ids('c:barChart')).toEqual(['101', '102']);
  expect(axis_ids('c:lineChart')).toEqual(['103', '104']);

});

test('xml', () => {

  const chart = BuildChart(ChartType.bar_stacked, 2);

  const xml = new ChartDocumentWriter().ToXML(chart);
  expect(xml.startsWith(XMLDeclaration + '<c:chartSpace ')).toBeTruthy();

  const bare = new ChartDocumentWriter({ xml_declaration: false }).ToXML(chart);
  expect(bare.startsWith('<c:chartSpace ')).toBeTruthy();

  // parse back
  const root = ElementUtils.Parse(xml).getroot();
  const group = Must(ElementUtils.Descend(root, 'c:chart', 'c:plotArea', 'c:barChart'));
  expect(ElementUtils.Children(group, 'c:ser').length).toEqual(2);
  expect(TextAt(ElementUtils.Children(group, 'c:ser')[1], 'c:tx', 'c:strRef', 'c:f')).toEqual('Sheet1!$C$1');

});
