/**
 * @file Shared Parsing Utilities
 *
 * YAML loading, zod issue formatting and record-file decoding shared by
 * the workflow parser and the CLI.
 *
 * @module dag/graph/parser
 */

import yaml from 'js-yaml';
import Papa from 'papaparse';
import type { ZodError } from 'zod';
import { ConfigurationError } from '../../../errors.js';

/** Parse a YAML (or JSON) string into a JS value. */
export function yaml_parse(yamlStr: string): unknown {
    try {
        return yaml.load(yamlStr);
    } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid YAML: ${reason}`);
    }
}

/** Flatten zod issues into one line: `[path] message; ...`. */
export function issues_format(error: ZodError): string {
    return error.issues
        .map(i => `[${i.path.join('.')}] ${i.message}`)
        .join('; ');
}

/**
 * Decode a record file. `.json` files hold an array of strings. `.csv`
 * and `.tsv` files contribute the first column of every row, with no
 * header row. Any other file holds one record per non-empty line.
 *
 * @param content - File content
 * @param filename - Name used to pick the format and in errors
 * @throws {ConfigurationError} On a malformed JSON or delimited record file
 */
export function records_parse(content: string, filename: string): string[] {
    const lower: string = filename.toLowerCase();
    if (lower.endsWith('.json')) {
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error: unknown) {
            const reason: string = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Invalid record file '${filename}': ${reason}`);
        }
        if (!Array.isArray(raw) || !raw.every((item: unknown): item is string => typeof item === 'string')) {
            throw new ConfigurationError(`Invalid record file '${filename}': expected an array of strings`);
        }
        return raw;
    }
    if (lower.endsWith('.csv') || lower.endsWith('.tsv')) {
        return column_extract(content, lower.endsWith('.csv') ? ',' : '\t', filename);
    }
    return content
        .split(/\r?\n/)
        .map((line: string): string => line.trim())
        .filter((line: string): boolean => line.length > 0);
}

function column_extract(content: string, delimiter: string, filename: string): string[] {
    const parsed = Papa.parse<string[]>(content, { delimiter, skipEmptyLines: true });
    if (parsed.errors.length > 0) {
        const reasons: string = parsed.errors
            .map(e => (e.row !== undefined ? `row ${e.row + 1}: ${e.message}` : e.message))
            .join('; ');
        throw new ConfigurationError(`Invalid record file '${filename}': ${reasons}`);
    }
    return parsed.data
        .map((row: string[]): string => (row[0] ?? '').trim())
        .filter((cell: string): boolean => cell.length > 0);
}
