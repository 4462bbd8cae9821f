import type { PRIMITIVES } from './constants';


type Constructor = abstract new (...args: never[]) => unknown;

type Primitive = typeof PRIMITIVES[number];

type TypeSpec = Constructor | Primitive;

type OneOrMany<T> = T | readonly T[];

type Nil<O> = O extends { nullable: true } ? null | undefined : never;

// Maps a type specification onto the TypeScript type it admits
type Resolve<S> = S extends readonly (infer U)[] ? ResolveOne<U> : ResolveOne<S>;

type ResolveOne<S> =
    S extends 'bigint' ? bigint :
    S extends 'boolean' ? boolean :
    S extends 'function' ? (...args: never[]) => unknown :
    S extends 'integer' | 'number' ? number :
    S extends 'object' ? object :
    S extends 'string' ? string :
    S extends 'symbol' ? symbol :
    S extends NumberConstructor ? number :
    S extends StringConstructor ? string :
    S extends BooleanConstructor ? boolean :
    S extends abstract new (...args: never[]) => infer R ? R : unknown;


type EqualityFn = (candidate: unknown, value: unknown) => boolean;

interface TypeOptions {
    // Template, see `Placeholders`
    message?: string;
    nullable?: boolean;
}

interface ValueOptions {
    complement?: boolean;
    // `false` treats an array passed as `values` as a single candidate
    expand?: boolean;
    message?: string;
    nullable?: boolean;

    // Called as `equals(candidate, value)`, method syntax keeps typed predicates assignable
    equals?(candidate: unknown, value: unknown): boolean;
}

interface RangeOptions {
    complement?: boolean;
    maxInclusive?: boolean;
    maximum?: number | bigint;
    message?: string;
    minInclusive?: boolean;
    minimum?: number | bigint;
    nullable?: boolean;
}

interface IterableOptions {
    elementsType?: OneOrMany<TypeSpec>;
    maxLength?: number;
    message?: string;
    minLength?: number;
    nullable?: boolean;
    nullableElements?: boolean;
    targetLength?: number;

    // Declared as a method so narrower callbacks such as `(n: number) => void` are accepted
    elementCheck?(element: unknown): unknown;
}

type Elements<O> =
    O extends { elementsType: infer S }
        ? Resolve<S> | (O extends { nullableElements: true } ? null | undefined : never)
        : unknown;

/**
 * Values available to a custom `message` template as `{key}`
 */
interface Placeholders {
    expected?: string;
    index?: number;
    length?: number;
    name: string;
    type?: string;
    value?: string;
}


export type {
    Constructor,
    Elements,
    EqualityFn,
    IterableOptions,
    Nil,
    OneOrMany,
    Placeholders,
    Primitive,
    RangeOptions,
    Resolve,
    TypeOptions,
    TypeSpec,
    ValueOptions
};
