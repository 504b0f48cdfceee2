/**
 * Constructor of a DTO class, or one of the built-in constructors
 * (String, Number, Boolean, Date, Object, Array) used as type markers.
 */
export type ClassType<T = unknown> = new (...args: unknown[]) => T;

/**
 * Marks a typed array, since emitted design types only say `Array`.
 *
 * ```typescript
 * @Get('pets', { result: ArrayOf(Pet) })
 * ```
 */
export class ArrayDescriptor {
    constructor(public readonly itemType: TypeDescriptor) {}
}

export function ArrayOf(itemType: TypeDescriptor): ArrayDescriptor {
    return new ArrayDescriptor(itemType);
}

/**
 * Runtime description of a value's type, handed to the Serializer.
 */
export type TypeDescriptor = ClassType | ArrayDescriptor;

export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
    return typeof value === 'function' || value instanceof ArrayDescriptor;
}

export function describeType(type: TypeDescriptor): string {
    if (type instanceof ArrayDescriptor) {
        return `Array<${describeType(type.itemType)}>`;
    }
    return type.name || 'anonymous class';
}
