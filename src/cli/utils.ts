import { readFile, stat } from "fs/promises";
import { glob } from "glob";
import { load } from "js-yaml";
import { extname, resolve } from "path";

import type { Logger } from "../logger";
import { assertOpenApiDocument, type OpenApiDocument } from "../openapi/types";

const DESCRIPTION_EXTENSIONS = [".json", ".yaml", ".yml"];

/**
 * Debug output on stderr, enabled by `--debug`
 */
export class DebugLogger implements Logger {
    constructor(
        private readonly enabled: boolean,
        private readonly write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
    ) {}

    group(title: string): void {
        if (!this.enabled) return;
        this.write(`\n[DEBUG] === ${title} ===`);
    }

    log(...args: unknown[]): void {
        if (!this.enabled) return;
        this.write(`[DEBUG] ${args.map(formatArg).join(" ")}`);
    }
}

function formatArg(arg: unknown): string {
    if (typeof arg === "string") return arg;
    return JSON.stringify(arg) ?? String(arg);
}

function isDescriptionFile(path: string): boolean {
    return DESCRIPTION_EXTENSIONS.includes(extname(path));
}

/**
 * Expands a list of file paths, directories, or glob patterns into a list of
 * OpenAPI description files (.json, .yaml, .yml).
 */
export async function expandSpecPaths(paths: string[]): Promise<string[]> {
    const allFiles = new Set<string>();

    for (const path of paths) {
        const resolvedPath = resolve(path);

        try {
            const stats = await stat(resolvedPath);

            if (stats.isDirectory()) {
                const pattern = `${resolvedPath}/**/*.{json,yaml,yml}`;
                const files = await glob(pattern, { nodir: true, absolute: true });
                files.forEach((f) => allFiles.add(f));
            } else if (stats.isFile() && isDescriptionFile(resolvedPath)) {
                allFiles.add(resolvedPath);
            }
        } catch {
            // not an existing path, treat it as a glob pattern
            const files = await glob(path, { nodir: true, absolute: true });
            files.filter(isDescriptionFile).forEach((f) => allFiles.add(f));
        }
    }

    return Array.from(allFiles).sort();
}

/**
 * Parse description text by file extension
 */
export function parseDescription(path: string, content: string): unknown {
    switch (extname(path)) {
        case ".json":
            return JSON.parse(content);
        case ".yaml":
        case ".yml":
            return load(content);
        default:
            throw new Error("Unsupported file format. Use .json or .yaml/.yml files.");
    }
}

/**
 * Read and parse an OpenAPI 3.0 description
 */
export async function loadDocument(path: string): Promise<OpenApiDocument> {
    const content = await readFile(path, "utf8");
    const document = parseDescription(path, content);
    assertOpenApiDocument(document);
    return document;
}
