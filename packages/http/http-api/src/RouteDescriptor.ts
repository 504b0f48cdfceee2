import { RouteDefinitionError } from './errors';
import { TypeDescriptor } from './TypeDescriptor';
import { HttpMethod } from './types';
import { parseUrlTemplate, placeholderNames, TemplateSegment } from './UrlTemplate';

/**
 * One declared parameter of a client method, in declaration order.
 */
export interface ParamSpec {
    readonly name: string;
    readonly type: TypeDescriptor;
    readonly optional: boolean;
    readonly defaultValue?: unknown;
}

/**
 * Everything needed to compile a route. The decorators build this from a
 * method declaration; it can also be written out by hand.
 */
export interface RouteDefinition {
    /** Used in log lines and error messages, e.g. 'PetStoreClient.getPet' */
    name: string;
    urlTemplate: string;
    method: HttpMethod;
    params: readonly ParamSpec[];
    bodyParam?: string;
    resultType?: TypeDescriptor;
}

/**
 * RouteDescriptor - Compiled, immutable request shape of one client method.
 *
 * Built once when the client class is declared and reused by every call.
 * `queryParams` is the args shape sent as the query string: the declared
 * parameters minus the `consumed` ones (URL placeholders and the body).
 */
export class RouteDescriptor {
    readonly name: string;
    readonly urlTemplate: string;
    readonly method: HttpMethod;
    readonly params: readonly ParamSpec[];
    readonly queryParams: readonly ParamSpec[];
    readonly segments: readonly TemplateSegment[];
    readonly placeholders: ReadonlySet<string>;
    readonly consumed: ReadonlySet<string>;
    readonly bodyParam?: string;
    readonly bodyType?: TypeDescriptor;
    readonly resultType?: TypeDescriptor;

    constructor(definition: RouteDefinition, segments: TemplateSegment[]) {
        this.name = definition.name;
        this.urlTemplate = definition.urlTemplate;
        this.method = definition.method;
        this.params = Object.freeze([...definition.params]);
        this.segments = Object.freeze(segments);
        this.placeholders = placeholderNames(segments);
        this.bodyParam = definition.bodyParam;
        this.resultType = definition.resultType;

        const consumed = new Set(this.placeholders);
        if (definition.bodyParam !== undefined) {
            consumed.add(definition.bodyParam);
        }
        this.consumed = consumed;
        this.queryParams = Object.freeze(this.params.filter((param) => !consumed.has(param.name)));
        this.bodyType = this.params.find((param) => param.name === definition.bodyParam)?.type;

        Object.freeze(this);
    }
}

/**
 * Validate a route definition and compile it.
 *
 * @throws RouteDefinitionError when the template is malformed, names a
 * parameter the method does not declare or one that may be left unbound,
 * or the body parameter is missing or doubles as a placeholder.
 */
export function compileRoute(definition: RouteDefinition): RouteDescriptor {
    const where = `${definition.name} (${definition.method} '${definition.urlTemplate}')`;
    const declared = new Map<string, ParamSpec>();
    for (const param of definition.params) {
        if (declared.has(param.name)) {
            throw new RouteDefinitionError(`Parameter '${param.name}' is declared twice in ${where}`);
        }
        declared.set(param.name, param);
    }

    const segments = parseUrlTemplate(definition.urlTemplate);
    for (const name of placeholderNames(segments)) {
        const param = declared.get(name);
        if (!param) {
            throw new RouteDefinitionError(
                `URL placeholder '{${name}}' does not match any parameter of ${where}`,
            );
        }
        if (param.optional && !('defaultValue' in param)) {
            throw new RouteDefinitionError(
                `URL placeholder '{${name}}' of ${where} is bound to optional parameter '${name}' without a default`,
            );
        }
    }

    const body = definition.bodyParam;
    if (body !== undefined) {
        if (!declared.has(body)) {
            throw new RouteDefinitionError(`Body parameter '${body}' is not a parameter of ${where}`);
        }
        if (segments.some((segment) => segment.kind === 'placeholder' && segment.name === body)) {
            throw new RouteDefinitionError(
                `Body parameter '${body}' is also used as a URL placeholder in ${where}`,
            );
        }
    }

    return new RouteDescriptor(definition, segments);
}
