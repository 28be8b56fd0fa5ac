
import { AxisIdAllocator, AxisIdLimit } from '../src/axis-id';
import { Chart } from '../src/chart';
import { BubbleChartData, CategoryChartData, XyChartData } from '../src/chart-data';
import { ChartType } from '../src/chart-type';
import { ChartConfigurationError } from '../src/errors';
import { Plot } from '../src/plot';

/** returns the values in order, then repeats */
const Sequence = (...values: number[]) => {
  let index = 0;
  return () => values[(index++) % values.length];
};

const CategoryData = () => {
  const data = new CategoryChartData(['a', 'b']);
  data.AddSeries('S1', [1, 2]);
  return data;
};

test('allocator', () => {

  const allocator = new AxisIdAllocator(Sequence(7, 7, 7, 9));
  expect(allocator.Next()).toEqual(7);
  expect(allocator.Next()).toEqual(9);
  expect(allocator.Has(7)).toBeTruthy();
  expect(allocator.Has(8)).toBeFalsy();

  const reserved = new AxisIdAllocator(Sequence(100, 200));
  reserved.Reserve(100);
  expect(reserved.Next()).toEqual(200);

  // out of range values are folded in
  const wrapped = new AxisIdAllocator(Sequence(AxisIdLimit + 5.5));
  expect(wrapped.Next()).toEqual(5);

});

test('repeating random source', () => {

  let draws = 0;
  const allocator = new AxisIdAllocator(() => { draws++; return 42; });
  expect(allocator.Next()).toEqual(42);

  expect(() => allocator.Next()).toThrow(ChartConfigurationError);
  expect(() => allocator.Next()).toThrow('no unused axis id after 1000 draws');
  expect(draws).toEqual(2001);

});

test('random ids', () => {

  const allocator = new AxisIdAllocator();
  for (let i = 0; i < 20; i++) {
    const id = allocator.Next();
    expect(Number.isInteger(id)).toBeTruthy();
    expect(id).toBeGreaterThanOrEqual(0);
    expect(id).toBeLessThan(AxisIdLimit);
  }

});

test('primary axes', () => {

  const chart = new Chart({ random: Sequence(11, 22, 33, 44) });
  expect(chart.x_axis_id).toEqual(11);
  expect(chart.y_axis_id).toEqual(22);
  expect(chart.has_axes).toBeFalsy();

  const plot = new Plot(ChartType.column_clustered, CategoryData());
  chart.AddPlot(plot);

  expect(chart.has_axes).toBeTruthy();
  expect(plot.x_axis_id).toEqual(11);
  expect(plot.y_axis_id).toEqual(22);
  expect(chart.has_secondary_axes).toBeFalsy();
  expect(chart.data_shape).toEqual('category');

});

test('reserved ids', () => {

  const chart = new Chart({ random: Sequence(11, 22, 33), reserved_axis_ids: [11] });
  expect(chart.x_axis_id).toEqual(22);
  expect(chart.y_axis_id).toEqual(33);

});

test('axis mutual exclusion', () => {

  const chart = new Chart();
  chart.AddPlot(new Plot(ChartType.column_clustered, CategoryData()));
  expect(() => chart.AddPlot(new Plot(ChartType.pie, CategoryData()))).toThrow(ChartConfigurationError);

  const pie_chart = new Chart();
  pie_chart.AddPlot(new Plot(ChartType.pie, CategoryData()));
  expect(() => pie_chart.AddPlot(new Plot(ChartType.line, CategoryData()))).toThrow('can\'t mix a plot with and without axes');
  expect(pie_chart.plots.length).toEqual(1);

});

test('secondary axis sharing', () => {

  let calls = 0;
  const values = [11, 22, 33, 44, 55, 66];
  const chart = new Chart({ random: () => values[calls++] });

  const bars = new Plot(ChartType.column_clustered, CategoryData());
  const line_1 = new Plot(ChartType.line, CategoryData(), true);
  const line_2 = new Plot(ChartType.line_markers, CategoryData(), true);

  chart.AddPlot(bars).AddPlot(line_1).AddPlot(line_2);

  expect(chart.has_secondary_axes).toBeTruthy();
  expect(line_1.x_axis_id).toEqual(33);
  expect(line_1.y_axis_id).toEqual(44);
  expect(line_2.x_axis_id).toEqual(33);
  expect(line_2.y_axis_id).toEqual(44);
  expect(bars.x_axis_id).toEqual(11);

  // primary pair plus one secondary pair
  expect(calls).toEqual(4);

});

test('plot data shape', () => {

  expect(() => new Plot(ChartType.xy_scatter, new CategoryChartData())).toThrow(
    'chart type xy_scatter needs xy data, got category data');
  expect(() => new Plot(ChartType.bubble, new XyChartData())).toThrow(ChartConfigurationError);
  expect(() => new Plot(ChartType.bar_clustered, new BubbleChartData())).toThrow(ChartConfigurationError);

  const plot = new Plot(ChartType.radar_filled, CategoryData());
  expect(plot.has_axes).toBeFalsy();
  expect(plot.series.length).toEqual(1);

});

test('chart categories', () => {

  const chart = new Chart();
  const data = CategoryData();
  chart.AddPlot(new Plot(ChartType.area, data));
  expect(chart.categories).toBe(data.categories);

  const scatter = new Chart();
  scatter.AddPlot(new Plot(ChartType.xy_scatter_lines, new XyChartData()));
  expect(scatter.categories).toBeUndefined();
  expect(scatter.data_shape).toEqual('xy');

});

test('data shapes on shared axes', () => {

  const chart = new Chart();
  chart.AddPlot(new Plot(ChartType.column_clustered, CategoryData()));

  expect(() => chart.AddPlot(new Plot(ChartType.xy_scatter, new XyChartData()))).toThrow(ChartConfigurationError);
  expect(() => chart.AddPlot(new Plot(ChartType.xy_scatter, new XyChartData()))).toThrow(
    'can\'t mix category and xy plots on the same axes');
  expect(chart.plots.length).toEqual(1);

  // a different pair is fine
  chart.AddPlot(new Plot(ChartType.xy_scatter_lines, new XyChartData(), true));
  expect(() => chart.AddPlot(new Plot(ChartType.bubble, new BubbleChartData(), true))).toThrow(
    'can\'t mix xy and bubble plots on the same axes');
  expect(chart.plots.length).toEqual(2);

});
