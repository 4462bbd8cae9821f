import { describe, expect, it } from 'vitest';
import message from '~/message';


class Point {
    x = 1;
}


describe('message.render', () => {
    it('renders primitives', () => {
        expect(message.render('a')).toBe("'a'");
        expect(message.render(5)).toBe('5');
        expect(message.render(5n)).toBe('5n');
        expect(message.render(true)).toBe('true');
        expect(message.render(null)).toBe('null');
        expect(message.render(undefined)).toBe('undefined');
        expect(message.render(Symbol('s'))).toBe('Symbol(s)');
    });

    it('renders arrays and plain objects recursively', () => {
        expect(message.render([1, 'b', [null]])).toBe("[1, 'b', [null]]");
        expect(message.render({ a: 1, b: { c: 'd' } })).toBe("{ a: 1, b: { c: 'd' } }");
        expect(message.render({})).toBe('{}');
        expect(message.render([])).toBe('[]');
    });

    it('marks cycles without marking shared references', () => {
        let cyclic: Record<string, unknown> = { a: 1 },
            shared = [1];

        cyclic.self = cyclic;

        expect(message.render(cyclic)).toBe('{ a: 1, self: [Circular] }');
        expect(message.render([shared, shared])).toBe('[[1], [1]]');
    });

    it('renders functions, dates and class instances', () => {
        function named() {}

        expect(message.render(named)).toBe('[Function named]');
        expect(message.render(new Date(0))).toBe('1970-01-01T00:00:00.000Z');
        expect(message.render(new Date(NaN))).toBe('Invalid Date');
        expect(message.render(new Map())).toBe('[object Map]');
        expect(message.render(new Point())).toBe('[object Object]');
    });

    it('renders objects without toString', () => {
        expect(message.render(Object.create(Object.create(null)))).toBe('[object Object]');
        expect(message.render([Object.create(Object.create(null))])).toBe('[[object Object]]');
    });

    it('names accessors instead of invoking them', () => {
        let reads = 0,
            value = {
                get a(): number {
                    reads++;
                    throw new Error('getter');
                },
                set b(_: number) {}
            };

        expect(message.render(value)).toBe('{ a: [Getter], b: [Setter] }');
        expect(reads).toBe(0);
    });
});


describe('message.format', () => {
    it('replaces known placeholders and keeps the rest', () => {
        expect(message.format('<{name}> at {index}: {missing}', { index: 0, name: 'xs' })).toBe('<xs> at 0: {missing}');
    });

    it('ignores inherited properties', () => {
        expect(message.format('{constructor} {toString} {name}', { name: 'x' })).toBe('{constructor} {toString} x');
    });
});


describe('message.nameOf', () => {
    it('names type specifications', () => {
        expect(message.nameOf('string')).toBe('string');
        expect(message.nameOf(Point)).toBe('Point');
    });
});
