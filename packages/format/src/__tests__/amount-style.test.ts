import { InvalidArgumentError } from '@moneta/core';
import { describe, expect, it } from 'vitest';

import { AmountStyle } from '../amount-style.js';
import { getLocaleNumberSymbols } from '../locale-symbols.js';

describe('AmountStyle', () => {
  it('resolves fixed styles without consulting the locale', () => {
    const style = AmountStyle.ASCII_DECIMAL_COMMA_GROUP3_DOT;

    expect(style.isLocalized()).toBe(false);
    expect(style.localize('en-US')).toEqual({
      decimalPointChar: ',',
      forceDecimalPoint: false,
      grouping: true,
      groupingChar: '.',
      groupingSize: 3,
      zeroDigit: '0',
    });
  });

  it('fills localized fields from the locale', () => {
    const style = AmountStyle.LOCALIZED_GROUPING;

    expect(style.isLocalized()).toBe(true);
    expect(style.localize('de-DE')).toMatchObject({ decimalPointChar: ',', groupingChar: '.', groupingSize: 3 });
    expect(style.localize('en-US')).toMatchObject({ decimalPointChar: '.', groupingChar: ',', groupingSize: 3 });
  });

  it('does not change the style when localizing', () => {
    const style = AmountStyle.LOCALIZED_NO_GROUPING;

    const resolved = style.localize('de-DE');

    expect(Object.isFrozen(resolved)).toBe(true);
    expect(style.decimalPointChar).toBeUndefined();
    expect(style.groupingChar).toBeUndefined();
    expect(style.grouping).toBe(false);
  });

  it('keeps explicit fields over locale ones', () => {
    const style = AmountStyle.LOCALIZED_GROUPING.withGroupingChar("'");

    expect(style.localize('de-DE')).toMatchObject({ decimalPointChar: ',', groupingChar: "'" });
  });

  it('returns new styles from with methods', () => {
    const base = AmountStyle.ASCII_DECIMAL_POINT_NO_GROUPING;
    const forced = base.withForcedDecimalPoint(true);

    expect(forced).not.toBe(base);
    expect(forced.forceDecimalPoint).toBe(true);
    expect(base.forceDecimalPoint).toBe(false);
    expect(forced.withForcedDecimalPoint(false).equals(base)).toBe(true);
    expect(base.withGrouping(true).withGroupingSize(4).groupingSize).toBe(4);
  });

  it('rejects invalid options', () => {
    expect(() => AmountStyle.of({ groupingChar: 'ab' })).toThrow(InvalidArgumentError);
    expect(() => AmountStyle.of({ groupingSize: 0 })).toThrow(InvalidArgumentError);
    expect(() => AmountStyle.of({ decimalPointChar: '.', groupingChar: '.' })).toThrow(
      'Decimal point and grouping characters must differ'
    );
    expect(() => AmountStyle.ASCII_DECIMAL_POINT_GROUP3_COMMA.withZeroDigit('')).toThrow(InvalidArgumentError);
  });

  it('describes unset fields as localized', () => {
    expect(AmountStyle.LOCALIZED_NO_GROUPING.toString()).toBe(
      'AmountStyle[zero=localized,decimalPoint=localized,grouping=false,groupingChar=localized,' +
        'groupingSize=localized,forceDecimalPoint=false]'
    );
  });
});

describe('getLocaleNumberSymbols', () => {
  it('caches one frozen snapshot per canonical locale', () => {
    const first = getLocaleNumberSymbols('en-us');

    expect(getLocaleNumberSymbols('en-US')).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(first.zeroDigit).toBe('0');
  });

  it('rejects malformed locale tags', () => {
    expect(() => getLocaleNumberSymbols('not a locale')).toThrow(InvalidArgumentError);
  });
});
