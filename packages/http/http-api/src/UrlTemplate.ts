import { RouteDefinitionError } from './errors';

export type TemplateSegment =
    | { kind: 'literal'; text: string }
    | { kind: 'placeholder'; name: string };

const PLACEHOLDER_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Split a URL template such as `users/{userId}/posts` into literal and
 * placeholder segments. `{{` and `}}` stand for literal braces.
 */
export function parseUrlTemplate(template: string): TemplateSegment[] {
    const segments: TemplateSegment[] = [];
    let literal = '';
    let i = 0;

    while (i < template.length) {
        const ch = template[i];
        if ((ch === '{' || ch === '}') && template[i + 1] === ch) {
            literal += ch;
            i += 2;
            continue;
        }
        if (ch === '}') {
            throw new RouteDefinitionError(
                `Single '}' at position ${i} in URL template '${template}'; write '}}' for a literal brace`,
            );
        }
        if (ch !== '{') {
            literal += ch;
            i++;
            continue;
        }

        const close = template.indexOf('}', i + 1);
        if (close < 0) {
            throw new RouteDefinitionError(`Unclosed '{' at position ${i} in URL template '${template}'`);
        }
        const name = template.slice(i + 1, close);
        if (!PLACEHOLDER_NAME.test(name)) {
            throw new RouteDefinitionError(
                `Invalid placeholder '{${name}}' in URL template '${template}'; placeholders must be parameter names`,
            );
        }
        if (literal) {
            segments.push({ kind: 'literal', text: literal });
            literal = '';
        }
        segments.push({ kind: 'placeholder', name });
        i = close + 1;
    }

    if (literal) {
        segments.push({ kind: 'literal', text: literal });
    }
    return segments;
}

export function placeholderNames(segments: readonly TemplateSegment[]): Set<string> {
    const names = new Set<string>();
    for (const segment of segments) {
        if (segment.kind === 'placeholder') {
            names.add(segment.name);
        }
    }
    return names;
}

/**
 * Substitute every placeholder with the string form of its value.
 * Values are inserted unencoded.
 */
export function expandUrlTemplate(
    segments: readonly TemplateSegment[],
    values: ReadonlyMap<string, unknown>,
): string {
    let url = '';
    for (const segment of segments) {
        if (segment.kind === 'literal') {
            url += segment.text;
            continue;
        }
        const value = values.get(segment.name);
        if (value === undefined || value === null) {
            throw new RouteDefinitionError(`No value bound for URL placeholder '{${segment.name}}'`);
        }
        url += String(value);
    }
    return url;
}
