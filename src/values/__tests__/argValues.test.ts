import { bool, int, list, optional, parseInteger, rune, str } from '../argValues';

describe('argValues', () => {
  test('parses integers with radix prefixes and signs', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger('-7')).toBe(-7);
    expect(parseInteger('+7')).toBe(7);
    expect(parseInteger('0x1F')).toBe(31);
    expect(parseInteger('0o17')).toBe(15);
    expect(parseInteger('-0b101')).toBe(-5);
    expect(parseInteger('-0')).toBe(0);
    expect(parseInteger('1.5')).toBeUndefined();
    expect(parseInteger('')).toBeUndefined();
    expect(parseInteger('99999999999999999999')).toBeUndefined();
  });

  test('int reports the raw token on failure', () => {
    expect(int().parse('12')).toEqual({ ok: true, value: 12 });
    expect(int().parse('bar')).toEqual({ ok: false, error: 'invalid integer: "bar"' });
    expect(int().wantsArgument).toBe(true);
  });

  test('bool is a switch with spelled-out values', () => {
    const b = bool();
    expect(b.wantsArgument).toBe(false);
    expect(b.parse('')).toEqual({ ok: true, value: true });
    expect(b.parse('YES')).toEqual({ ok: true, value: true });
    expect(b.parse('off')).toEqual({ ok: true, value: false });
    expect(b.parse('0')).toEqual({ ok: true, value: false });
    expect(b.parse('1')).toEqual({ ok: true, value: true });
    expect(b.parse('2')).toEqual({ ok: false, error: 'invalid bool: "2"' });
    expect(b.parse('maybe')).toEqual({ ok: false, error: 'invalid bool: "maybe"' });
  });

  test('str and rune', () => {
    expect(str().parse('')).toEqual({ ok: true, value: '' });
    expect(rune().parse('λ')).toEqual({ ok: true, value: 'λ' });
    expect(rune().parse('ab')).toEqual({ ok: false, error: 'invalid rune: "ab"' });
  });

  test('optional keeps arity and defaults to OPTIONAL', () => {
    const v = optional(bool());
    expect(v.wantsArgument).toBe(false);
    expect(v.defaultCount).toBe('OPTIONAL');
    expect(v.parse('', null)).toEqual({ ok: true, value: true });
  });

  test('list appends and defaults to REPEATED', () => {
    const v = list(int());
    expect(v.defaultCount).toBe('REPEATED');
    expect(v.parse('3', [1, 2])).toEqual({ ok: true, value: [1, 2, 3] });
    expect(v.parse('x', [1])).toEqual({ ok: false, error: 'invalid integer: "x"' });
  });
});
