
import { Categories } from '../src/categories';
import { ChartConfigurationError } from '../src/errors';

test('strings', () => {

  const categories = new Categories(['East', 'West', 'North']);
  expect(categories.kind).toEqual('string');
  expect(categories.depth).toEqual(1);
  expect(categories.leaf_count).toEqual(3);
  expect(categories.are_numeric).toBeFalsy();
  expect(categories.number_format).toEqual('General');
  expect(categories.Label(1)).toEqual('West');

});

test('numbers', () => {

  const categories = new Categories([1, 2.5, 4]);
  expect(categories.kind).toEqual('number');
  expect(categories.are_numeric).toBeTruthy();
  expect(categories.are_dates).toBeFalsy();
  expect(categories.NumericText(1)).toEqual('2.5');

  const formatted = new Categories([1, 2], { number_format: '0.00' });
  expect(formatted.number_format).toEqual('0.00');

});

test('dates', () => {

  const categories = new Categories([new Date(2024, 0, 1), new Date(2024, 0, 2)]);
  expect(categories.kind).toEqual('date');
  expect(categories.are_numeric).toBeTruthy();
  expect(categories.are_dates).toBeTruthy();
  expect(categories.number_format).toEqual('yyyy\\-mm\\-dd');
  expect(categories.Label(0)).toEqual('2024-01-01');
  expect(categories.NumericText(0)).toEqual('45292');
  expect(categories.NumericText(1)).toEqual('45293');
  expect(categories.NumericText(0, true)).toEqual('43830');

});

test('dates are calendar values', () => {

  // the suite runs in Asia/Tokyo
  expect(new Date(2024, 0, 1).getTimezoneOffset()).toEqual(-540);

  const categories = new Categories([new Date(2024, 0, 1), new Date(2024, 6, 1, 6)]);
  expect(categories.Label(0)).toEqual('2024-01-01');
  expect(categories.Label(1)).toEqual('2024-07-01');
  expect(categories.NumericText(0)).toEqual('45292');
  expect(categories.NumericText(1)).toEqual('45474.25');

});

test('homogeneous kind', () => {

  expect(() => new Categories(['a', 1])).toThrow(ChartConfigurationError);
  expect(() => new Categories(['a', 1])).toThrow('mixed category types (string, number)');
  expect(() => new Categories([1, new Date(0)])).toThrow('mixed category types (number, date)');
  expect(() => new Categories([1, NaN])).toThrow('invalid numeric category at index 1');
  expect(() => new Categories([new Date(NaN)])).toThrow('invalid date category at index 0');

});

test('multi-level', () => {

  const categories = new Categories([['Q1', 'Jan'], ['Q1', 'Feb'], ['Q2', 'Mar']]);

  expect(categories.kind).toEqual('multi_level');
  expect(categories.depth).toEqual(2);
  expect(categories.leaf_count).toEqual(3);
  expect(categories.Label(2)).toEqual('Mar');

  expect(categories.levels).toEqual([
    [[0, 'Jan'], [1, 'Feb'], [2, 'Mar']],
    [[0, 'Q1'], [2, 'Q2']],
  ]);

});

test('multi-level runs', () => {

  // a parent label starts a new run when any higher level changes

  const categories = new Categories([
    ['2023', 'Q4', 'Dec'],
    ['2024', 'Q4', 'Dec'],
    ['2024', 'Q4', 'Jan'],
  ]);

  expect(categories.levels).toEqual([
    [[0, 'Dec'], [1, 'Dec'], [2, 'Jan']],
    [[0, 'Q4'], [1, 'Q4']],
    [[0, '2023'], [1, '2024']],
  ]);

});

test('multi-level depth', () => {

  expect(() => new Categories([['a', 'b'], ['c']])).toThrow('multi-level categories must all have the same depth');
  expect(() => new Categories([['a', 'b'], 'c'])).toThrow('can\'t mix multi-level and flat categories');

  // one level is just a flat list
  const single = new Categories([['a'], ['b']]);
  expect(single.kind).toEqual('string');
  expect(single.depth).toEqual(1);
  expect(single.Label(1)).toEqual('b');

});

test('empty', () => {

  const categories = new Categories();
  expect(categories.kind).toEqual('string');
  expect(categories.depth).toEqual(1);
  expect(categories.leaf_count).toEqual(0);
  expect(categories.levels).toEqual([[]]);

});
