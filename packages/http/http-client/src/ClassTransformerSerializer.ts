import { instanceToPlain, plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import {
    ArrayDescriptor,
    ClassType,
    describeType,
    isRecord,
    JsonValue,
    SerializationError,
    Serializer,
    TypeDescriptor,
} from '@restwire/http-api';

/**
 * ClassTransformerSerializer - Default Serializer of BaseClient.
 *
 * DTO classes go through class-transformer (so `@Type()` and `@Expose()`
 * work) and are checked with class-validator on the way in and out:
 *
 * ```typescript
 * export class NewPet {
 *     @IsString()
 *     name: string = '';
 *
 *     @ValidateNested({ each: true })
 *     @Type(() => Tag)
 *     tags: Tag[] = [];
 * }
 * ```
 *
 * String, Number and Boolean are checked by kind, Date travels as an
 * ISO-8601 string, and Object / Array accept any JSON.
 */
export class ClassTransformerSerializer implements Serializer {
    dump(value: unknown, type: TypeDescriptor): JsonValue {
        return this.dumpAt(value, type, '$');
    }

    load(json: JsonValue, type: TypeDescriptor): unknown {
        return this.loadAt(json, type, '$');
    }

    private dumpAt(value: unknown, type: TypeDescriptor, path: string): JsonValue {
        if (value === undefined || value === null) {
            return null;
        }
        if (type instanceof ArrayDescriptor) {
            if (!Array.isArray(value)) {
                throw mismatch(type, value, path);
            }
            return value.map((item, index) => this.dumpAt(item, type.itemType, `${path}[${index}]`));
        }
        if (type === String || type === Number || type === Boolean) {
            return this.checkPrimitive(value, type, path);
        }
        if (type === Date) {
            if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
                throw mismatch(type, value, path);
            }
            return value.toISOString();
        }
        if (type === Object) {
            return toJson(value, path);
        }
        if (type === Array) {
            if (!Array.isArray(value)) {
                throw mismatch(type, value, path);
            }
            return toJson(value, path);
        }
        return this.dumpInstance(value, type, path);
    }

    private loadAt(json: JsonValue, type: TypeDescriptor, path: string): unknown {
        if (type instanceof ArrayDescriptor) {
            if (!Array.isArray(json)) {
                throw mismatch(type, json, path);
            }
            return json.map((item, index) => this.loadAt(item, type.itemType, `${path}[${index}]`));
        }
        if (type === String || type === Number || type === Boolean) {
            return this.checkPrimitive(json, type, path);
        }
        if (type === Date) {
            const date = typeof json === 'string' ? new Date(json) : undefined;
            if (!date || Number.isNaN(date.getTime())) {
                throw mismatch(type, json, path);
            }
            return date;
        }
        if (type === Object) {
            return json;
        }
        if (type === Array) {
            if (!Array.isArray(json)) {
                throw mismatch(type, json, path);
            }
            return json;
        }
        if (!isRecord(json)) {
            throw mismatch(type, json, path);
        }
        const instance = plainToInstance(type, json);
        this.validate(instance, path);
        return instance;
    }

    private checkPrimitive(value: unknown, type: ClassType, path: string): string | number | boolean {
        if (type === String && typeof value === 'string') {
            return value;
        }
        if (type === Number && typeof value === 'number' && Number.isFinite(value)) {
            return value;
        }
        if (type === Boolean && typeof value === 'boolean') {
            return value;
        }
        throw mismatch(type, value, path);
    }

    private dumpInstance(value: unknown, type: ClassType, path: string): JsonValue {
        if (!isRecord(value)) {
            throw mismatch(type, value, path);
        }
        const instance = value instanceof type ? value : plainToInstance(type, value);
        this.validate(instance, path);
        return toJson(instanceToPlain(instance), path);
    }

    private validate(instance: unknown, path: string): void {
        if (typeof instance !== 'object' || instance === null) {
            return;
        }
        const errors = validateSync(instance, { forbidUnknownValues: false });
        if (errors.length > 0) {
            throw new SerializationError(formatValidationErrors(errors).join('; '), path);
        }
    }
}

function mismatch(type: TypeDescriptor, value: unknown, path: string): SerializationError {
    return new SerializationError(`Expected ${describeType(type)}, got ${kindOf(value)}`, path);
}

function kindOf(value: unknown): string {
    if (value === null) {
        return 'null';
    }
    if (Array.isArray(value)) {
        return 'array';
    }
    if (value instanceof Date) {
        return 'Date';
    }
    return typeof value;
}

/**
 * Flatten class-validator errors, children included, into readable lines.
 */
function formatValidationErrors(errors: ValidationError[], parent = ''): string[] {
    const messages: string[] = [];
    for (const error of errors) {
        const property = parent ? `${parent}.${error.property}` : error.property;
        if (error.constraints) {
            for (const constraint of Object.values(error.constraints)) {
                messages.push(`${property}: ${constraint}`);
            }
        }
        if (error.children && error.children.length > 0) {
            messages.push(...formatValidationErrors(error.children, property));
        }
    }
    return messages;
}

function toJson(value: unknown, path: string): JsonValue {
    if (value === undefined || value === null) {
        return null;
    }
    if (typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new SerializationError(`Number ${value} cannot be represented in JSON`, path);
        }
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (Array.isArray(value)) {
        return value.map((item, index) => toJson(item, `${path}[${index}]`));
    }
    if (isRecord(value)) {
        const json: { [key: string]: JsonValue } = {};
        for (const [key, item] of Object.entries(value)) {
            if (item !== undefined) {
                json[key] = toJson(item, `${path}.${key}`);
            }
        }
        return json;
    }
    throw new SerializationError(`Cannot serialize a ${typeof value} as JSON`, path);
}
