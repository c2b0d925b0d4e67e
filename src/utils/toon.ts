/**
 * Encoder for TOON (Token-Oriented Object Notation), the compact text form
 * used for retrieval context handed to the model.
 *
 * Arrays of uniform flat objects are written as a table: the field names are
 * declared once in the header and each element becomes one delimited row.
 *
 *   documents[2]{source,content}:
 *     handbook.pdf,Leave requests go through the portal.
 *     faq.md,"Opening hours: 9-5, weekdays"
 */

export type ToonDelimiter = ',' | '\t' | '|';

export interface ToonOptions {
    indent?: number;
    delimiter?: ToonDelimiter;
}

type Primitive = string | number | boolean | null;
type ToonNode = Primitive | ToonNode[] | { [key: string]: ToonNode };
type ToonObject = { [key: string]: ToonNode };

const UNQUOTED_KEY = /^[A-Za-z_][A-Za-z0-9_.]*$/;
const NUMERIC_LIKE = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;
const STRUCTURAL = /[:"\\[\]{}\u0000-\u001f]/;

function isPrimitive(value: ToonNode): value is Primitive {
    return value === null || typeof value !== 'object';
}

function isToonObject(value: ToonNode): value is ToonObject {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Brings arbitrary input into the JSON data model, as JSON.stringify would. */
function normalize(value: unknown): ToonNode {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(normalize);
    if (typeof value === 'object') {
        const result: ToonObject = {};
        for (const [key, entry] of Object.entries(value)) {
            if (entry === undefined || typeof entry === 'function' || typeof entry === 'symbol') continue;
            result[key] = normalize(entry);
        }
        return result;
    }
    return null;
}

function escapeString(value: string): string {
    return value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r')
        .replace(/\t/g, '\\t');
}

function formatNumber(value: number): string {
    if (Object.is(value, -0)) return '0';
    const text = String(value);
    if (!/e/i.test(text)) return text;
    return value.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 });
}

function encodeKey(key: string): string {
    return UNQUOTED_KEY.test(key) ? key : `"${escapeString(key)}"`;
}

export class ToonEncoder {
    private readonly indentUnit: string;
    private readonly delimiter: ToonDelimiter;

    constructor(options: ToonOptions = {}) {
        this.indentUnit = ' '.repeat(options.indent ?? 2);
        this.delimiter = options.delimiter ?? ',';
    }

    encode(value: unknown): string {
        const root = normalize(value);
        if (isPrimitive(root)) return this.primitive(root);

        const lines: string[] = [];
        if (Array.isArray(root)) {
            this.writeArray('', root, 0, lines);
        } else {
            this.writeObject(root, 0, lines);
        }
        return lines.join('\n');
    }

    private pad(depth: number): string {
        return this.indentUnit.repeat(depth);
    }

    private writeObject(object: ToonObject, depth: number, lines: string[]): void {
        for (const [key, value] of Object.entries(object)) {
            const name = encodeKey(key);
            if (Array.isArray(value)) {
                this.writeArray(name, value, depth, lines);
            } else if (isToonObject(value)) {
                lines.push(`${this.pad(depth)}${name}:`);
                this.writeObject(value, depth + 1, lines);
            } else {
                lines.push(`${this.pad(depth)}${name}: ${this.primitive(value)}`);
            }
        }
    }

    private writeArray(name: string, items: ToonNode[], depth: number, lines: string[]): void {
        const marker = this.delimiter === ',' ? '' : this.delimiter;
        const header = `${this.pad(depth)}${name}[${items.length}${marker}]`;

        if (items.length === 0) {
            lines.push(`${header}:`);
            return;
        }

        if (items.every(isPrimitive)) {
            const row = items.map(item => this.primitive(item)).join(this.delimiter);
            lines.push(`${header}: ${row}`);
            return;
        }

        const fields = this.tabularFields(items);
        if (fields) {
            lines.push(`${header}{${fields.map(encodeKey).join(this.delimiter)}}:`);
            for (const item of items) {
                if (!isToonObject(item)) continue;
                const cells = fields.map(field => {
                    const cell = item[field];
                    return isPrimitive(cell) ? this.primitive(cell) : 'null';
                });
                lines.push(`${this.pad(depth + 1)}${cells.join(this.delimiter)}`);
            }
            return;
        }

        lines.push(`${header}:`);
        for (const item of items) {
            this.writeListItem(item, depth + 1, lines);
        }
    }

    private writeListItem(item: ToonNode, depth: number, lines: string[]): void {
        const bullet = `${this.pad(depth)}- `;
        if (isPrimitive(item)) {
            lines.push(`${bullet}${this.primitive(item)}`);
            return;
        }
        if (isToonObject(item) && Object.keys(item).length === 0) {
            lines.push(`${this.pad(depth)}-`);
            return;
        }

        // Render one level deeper, then hang the first line on the bullet.
        const nested: string[] = [];
        if (Array.isArray(item)) {
            this.writeArray('', item, depth + 1, nested);
        } else {
            this.writeObject(item, depth + 1, nested);
        }
        const [first, ...rest] = nested;
        lines.push(`${bullet}${first.slice(this.pad(depth + 1).length)}`, ...rest);
    }

    /** Field list when every element is a flat object with identical keys. */
    private tabularFields(items: ToonNode[]): string[] | undefined {
        const [head] = items;
        if (!isToonObject(head)) return undefined;
        const fields = Object.keys(head);
        if (fields.length === 0) return undefined;

        const uniform = items.every(item => {
            if (!isToonObject(item)) return false;
            const keys = Object.keys(item);
            return keys.length === fields.length
                && fields.every(field => field in item && isPrimitive(item[field]));
        });
        return uniform ? fields : undefined;
    }

    private primitive(value: Primitive): string {
        if (value === null) return 'null';
        if (typeof value === 'boolean') return String(value);
        if (typeof value === 'number') return formatNumber(value);
        return this.needsQuotes(value) ? `"${escapeString(value)}"` : value;
    }

    private needsQuotes(value: string): boolean {
        return value === ''
            || value !== value.trim()
            || value === 'true' || value === 'false' || value === 'null'
            || NUMERIC_LIKE.test(value)
            || STRUCTURAL.test(value)
            || value.includes(this.delimiter)
            || value.startsWith('-');
    }
}

export function encodeToon(value: unknown, options?: ToonOptions): string {
    return new ToonEncoder(options).encode(value);
}
