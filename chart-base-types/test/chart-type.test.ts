
import {
  ChartType, ChartTypeCatalog, ChartTypeInfoFor, ChartTypeList, IsChartType,
} from '../src/chart-type';
import { UnsupportedChartTypeError } from '../src/errors';

test('catalog', () => {

  expect(ChartTypeList.length).toEqual(29);

  for (const chart_type of ChartTypeList) {
    expect(ChartTypeCatalog[chart_type]).toBeDefined();
  }

  const no_axes = ChartTypeList.filter(chart_type => !ChartTypeCatalog[chart_type].has_axes);
  expect(no_axes.sort()).toEqual([
    'doughnut', 'doughnut_exploded', 'pie', 'pie_exploded', 'radar', 'radar_filled', 'radar_markers',
  ]);

});

test('data shapes', () => {

  expect(ChartTypeCatalog[ChartType.bar_stacked].data_shape).toEqual('category');
  expect(ChartTypeCatalog[ChartType.xy_scatter_smooth].data_shape).toEqual('xy');
  expect(ChartTypeCatalog[ChartType.bubble_three_d_effect].data_shape).toEqual('bubble');

});

test('variants', () => {

  expect(ChartTypeCatalog[ChartType.column_stacked_100]).toEqual({
    family: 'bar', data_shape: 'category', has_axes: true, bar_direction: 'col', grouping: 'percentStacked',
  });

  expect(ChartTypeCatalog[ChartType.line_stacked]).toEqual({
    family: 'line', data_shape: 'category', has_axes: true, grouping: 'stacked', markers: false,
  });

  expect(ChartTypeCatalog[ChartType.xy_scatter]).toEqual({
    family: 'xy', data_shape: 'xy', has_axes: true, scatter_style: 'lineMarker', markers: true, lines: false,
  });

});

test('IsChartType', () => {

  expect(IsChartType('pie')).toBeTruthy();
  expect(IsChartType('xy_scatter_lines')).toBeTruthy();
  expect(IsChartType('pyramid')).toBeFalsy();
  expect(IsChartType(3)).toBeFalsy();
  expect(IsChartType(undefined)).toBeFalsy();

});

test('ChartTypeInfoFor', () => {

  expect(ChartTypeInfoFor(ChartType.pie_exploded)).toEqual({
    family: 'pie', data_shape: 'category', has_axes: false, exploded: true,
  });

  // values from JSON aren't checked by the compiler
  const parsed = JSON.parse('"pyramid"');
  expect(() => ChartTypeInfoFor(parsed)).toThrow(UnsupportedChartTypeError);
  expect(() => ChartTypeInfoFor(parsed)).toThrow('unsupported chart type: pyramid');

});
