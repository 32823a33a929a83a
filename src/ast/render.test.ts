import { BSONRegExp } from 'bson';
import {
  and,
  astField,
  comparison,
  elemMatch,
  elementField,
  eq,
  exists,
  fieldPath,
  fieldsEqual,
  inValues,
  matchesEverything,
  matchesNothing,
  ne,
  not,
  or,
  regex,
  size,
  subField
} from './factory';
import { FilterRenderError, renderFilter } from './render';

describe('renderFilter', () => {
  it('should render an existence check on a dotted path', () => {
    expect(renderFilter(exists(astField('a', 'b')))).toEqual({ 'a.b': { $exists: true } });
    expect(renderFilter(exists(astField('a'), false))).toEqual({ a: { $exists: false } });
  });

  it('should render comparisons', () => {
    expect(renderFilter(ne(astField('n'), 1))).toEqual({ n: { $ne: 1 } });
    expect(renderFilter(inValues(astField('n'), [1, 2]))).toEqual({ n: { $in: [1, 2] } });
    expect(renderFilter(size(astField('list'), 0))).toEqual({ list: { $size: 0 } });
  });

  it('should use the equality shorthand unless the value looks like an operator document', () => {
    expect(renderFilter(eq(astField('n'), 1))).toEqual({ n: 1 });
    expect(renderFilter(eq(astField('d'), { $gt: 1 }))).toEqual({ d: { $eq: { $gt: 1 } } });
    expect(renderFilter(eq(astField('r'), new BSONRegExp('a')))).toEqual({
      r: { $eq: new BSONRegExp('a') }
    });
  });

  it('should render regular expressions with and without options', () => {
    expect(renderFilter(regex(astField('s'), '^a'))).toEqual({ s: { $regex: '^a' } });
    expect(renderFilter(regex(astField('s'), '^a', 'i'))).toEqual({ s: { $regex: '^a', $options: 'i' } });
  });

  it('should keep the order of logical operands', () => {
    expect(renderFilter(and([exists(astField('b')), exists(astField('a'))]))).toEqual({
      $and: [{ b: { $exists: true } }, { a: { $exists: true } }]
    });
    expect(renderFilter(or([eq(astField('a'), 1), eq(astField('a'), 2)]))).toEqual({
      $or: [{ a: 1 }, { a: 2 }]
    });
  });

  describe('negation', () => {
    it('should use $ne for equality and $nin for $in', () => {
      expect(renderFilter(not(eq(astField('a'), 1)))).toEqual({ a: { $ne: 1 } });
      expect(renderFilter(not(inValues(astField('a'), [1])))).toEqual({ a: { $nin: [1] } });
    });

    it('should use $not for other field operations', () => {
      expect(renderFilter(not(exists(astField('a'))))).toEqual({ a: { $not: { $exists: true } } });
    });

    it('should use $nor for everything else', () => {
      expect(renderFilter(not(and([eq(astField('a'), 1)])))).toEqual({ $nor: [{ $and: [{ a: 1 }] }] });
    });
  });

  it('should render the constant filters', () => {
    expect(renderFilter(matchesEverything())).toEqual({});
    expect(renderFilter(matchesNothing())).toEqual({ _id: { $exists: false } });
  });

  describe('$elemMatch', () => {
    it('should render element conditions as an operator document', () => {
      const filter = elemMatch(
        astField('scores'),
        and([comparison('$gt', elementField(), 0), not(eq(elementField(), 5))])
      );

      expect(renderFilter(filter)).toEqual({ scores: { $elemMatch: { $gt: 0, $ne: 5 } } });
    });

    it('should render sub-field conditions as a query', () => {
      const filter = elemMatch(astField('items'), eq(astField('sku'), 'A-1'));

      expect(renderFilter(filter)).toEqual({ items: { $elemMatch: { sku: 'A-1' } } });
    });

    it('should reject element conditions that cannot share one operator document', () => {
      const filter = elemMatch(
        astField('scores'),
        and([regex(elementField(), 'a'), regex(elementField(), 'b')])
      );

      expect(() => renderFilter(filter)).toThrow(FilterRenderError);
    });
  });

  it('should reject element conditions outside $elemMatch', () => {
    expect(() => renderFilter(eq(elementField(), 1))).toThrow(
      'A comparison filter on the current array element can only appear inside $elemMatch'
    );
  });
});

describe('field paths', () => {
  it('should extend and compare paths', () => {
    const tags = astField('Tags');

    expect(subField(tags, 'red')).toEqual({ kind: 'field', path: ['Tags', 'red'] });
    expect(fieldPath(subField(tags, 'red'))).toBe('Tags.red');
    expect(fieldsEqual(subField(tags, 'red'), astField('Tags', 'red'))).toBe(true);
    expect(fieldsEqual(tags, astField('Tags', 'red'))).toBe(false);
  });
});
