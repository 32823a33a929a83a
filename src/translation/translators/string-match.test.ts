import { captureError } from '../../__fixtures__/errors';
import { personSerializer, prop, x } from '../../__fixtures__/models';
import { renderFilter } from '../../ast/render';
import { call, constant, lambda, not } from '../../expressions/factory';
import { Methods } from '../../expressions/methods';
import { Expression, IMethodInfo } from '../../expressions/types';
import { FilterTranslator } from '../../translators/filter';
import { UnsupportedExpressionError } from '../errors';
import { escapeRegex } from './string-match';

describe('string method translation', () => {
  const translator = new FilterTranslator(personSerializer);
  const render = (body: Expression) => renderFilter(translator.translate(lambda([x], body)));
  const onName = (method: IMethodInfo, search: unknown) => call(prop('Name'), method, [constant(search)]);

  it('should anchor startsWith at the beginning', () => {
    expect(render(onName(Methods.startsWith(), 'Jo'))).toEqual({ Name: { $regex: '^Jo' } });
  });

  it('should anchor endsWith at the end', () => {
    expect(render(onName(Methods.endsWith(), 'a.b'))).toEqual({ Name: { $regex: 'a\\.b$' } });
  });

  it('should leave includes unanchored', () => {
    expect(render(onName(Methods.stringIncludes(), '(x)'))).toEqual({ Name: { $regex: '\\(x\\)' } });
  });

  it('should negate a match with $not', () => {
    expect(render(not(onName(Methods.startsWith(), 'Jo')))).toEqual({
      Name: { $not: { $regex: '^Jo' } }
    });
  });

  it('should require a field stored as a string', () => {
    const error = captureError(() => render(call(prop('Age'), Methods.startsWith(), [constant('1')])));

    expect(error).toBeInstanceOf(UnsupportedExpressionError);
    expect(error).toHaveProperty(
      'reason',
      'startsWith requires a field stored as a string, but Int32Serializer is used'
    );
  });

  it('should require a constant search string', () => {
    expect(() => render(call(prop('Name'), Methods.startsWith(), [prop('Name')]))).toThrow(
      'the search string must be a string constant'
    );
  });

  describe('escapeRegex', () => {
    it('should escape metacharacters', () => {
      expect(escapeRegex('a.b*c')).toBe('a\\.b\\*c');
      expect(escapeRegex('[1+1]?')).toBe('\\[1\\+1\\]\\?');
    });

    it('should leave other characters alone', () => {
      expect(escapeRegex('plain text/with-slash')).toBe('plain text/with-slash');
    });
  });
});
