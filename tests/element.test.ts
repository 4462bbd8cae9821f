import { describe, expect, it } from 'vitest';
import { ArgumentValueError, assertIterable, ConfigurationError, element } from '../src';
import { thrown } from './utils';


describe('element.range', () => {
    let positive = element.range('weights', { minInclusive: false, minimum: 0 });

    it('checks a single element', () => {
        expect(() => positive(1)).not.toThrow();

        let error = thrown(() => positive(0));

        expect(error).toBeInstanceOf(ArgumentValueError);
        expect(error.message).toBe('The elements of <weights> have to be > 0, but 0 was encountered!');
    });

    it('plugs into assertIterable', () => {
        expect(() => assertIterable('weights', [0.5, 2], { elementCheck: positive })).not.toThrow();
        expect(thrown(() => assertIterable('weights', [0.5, 2, -1], { elementCheck: positive })).message).toBe(
            'The elements of <weights> have to be > 0, but -1 was encountered!'
        );
    });

    it('honors complement', () => {
        let outside = element.range('xs', { complement: true, maximum: 1, minimum: 0 });

        expect(() => outside(2)).not.toThrow();
        expect(thrown(() => outside(0.5)).message).toBe('The elements of <xs> have to be < 0 or > 1, but 0.5 was encountered!');
    });

    it('validates its options when built', () => {
        expect(() => element.range('xs', {})).toThrow(ConfigurationError);
        expect(() => element.range('xs', { maximum: 0, minimum: 1 })).toThrow(ConfigurationError);
    });
});


describe('element.value', () => {
    let colors = element.value('colors', ['red', 'green']);

    it('checks a single element', () => {
        expect(() => colors('red')).not.toThrow();
        expect(thrown(() => colors('blue')).message).toBe(
            "The elements of <colors> have to be any of ['red', 'green'], but 'blue' was encountered!"
        );
    });

    it('plugs into assertIterable', () => {
        expect(thrown(() => assertIterable('colors', ['red', 'blue'], { elementCheck: colors })).message).toBe(
            "The elements of <colors> have to be any of ['red', 'green'], but 'blue' was encountered!"
        );
    });

    it('honors complement and equals', () => {
        let names = element.value('names', ['admin'], {
            complement: true,
            equals: (candidate: string, value: string) => candidate === value.toLowerCase()
        });

        expect(() => names('alice')).not.toThrow();
        expect(thrown(() => names('Admin')).message).toBe(
            "The elements of <names> have to be distinct from ['admin'], but 'Admin' was encountered!"
        );
    });

    it('validates its options when built', () => {
        expect(() => element.value('xs', [])).toThrow(ConfigurationError);
    });

    it('fills placeholders in a custom message', () => {
        let tags = element.value('tags', 'x', { complement: true, message: '{name} must not contain {value}' });

        expect(thrown(() => tags('x')).message).toBe("tags must not contain 'x'");
    });
});
