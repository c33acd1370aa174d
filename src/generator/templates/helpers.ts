/**
 * Helper functions shared by the templates
 */
import type { IRType, Route } from "../../ir/types";
import { MODEL_MODULE, MODELS_NAMESPACE, type ImportSpec } from "./types";
import { referencedTypeNames } from "../naming";

/**
 * JSDoc block for `text`, indented by `indent`. Returns "" for empty text.
 */
export function docComment(text: string | undefined, indent = "", tags: string[] = []): string {
    const body = (text ?? "").trim();
    const lines = body ? body.split("\n").map((line) => line.trimEnd().replace(/\*\//g, "*\\/")) : [];
    lines.push(...tags);

    if (lines.length === 0) return "";
    if (lines.length === 1) return `${indent}/** ${lines[0]} */\n`;
    return `${indent}/**\n${lines.map((line) => (line ? `${indent} * ${line}` : `${indent} *`)).join("\n")}\n${indent} */\n`;
}

/**
 * JSDoc for a route: its summary and description, and `@deprecated`
 */
export function routeDoc(route: Route, indent = ""): string {
    return docComment(route.description, indent, route.deprecated ? ["@deprecated"] : []);
}

/**
 * Namespace import of the model module, or nothing when no model type is used.
 * The import is dropped again when files are merged into one unit.
 */
export function modelImport(types: IRType[]): ImportSpec[] {
    if (referencedTypeNames(types).length === 0) return [];
    return [{ from: MODEL_MODULE, namespace: MODELS_NAMESPACE }];
}

export function indent(text: string, prefix: string): string {
    return text
        .split("\n")
        .map((line) => (line ? prefix + line : line))
        .join("\n");
}

/**
 * Join non-empty sections with a blank line
 */
export function sections(...parts: string[]): string {
    return parts.filter((part) => part.trim() !== "").join("\n\n");
}

/**
 * Tagged template that drops a blank first and last line and strips the common
 * indentation. Interpolations are inserted as they are, so keep them single-line.
 */
export function dedent(strings: TemplateStringsArray, ...values: unknown[]): string {
    const text = strings.reduce((acc, part, i) => acc + (i > 0 ? String(values[i - 1]) : "") + part, "");
    const lines = text.split("\n");
    if (lines[0]?.trim() === "") lines.shift();
    if (lines[lines.length - 1]?.trim() === "") lines.pop();

    const margin = Math.min(...lines.filter((line) => line.trim() !== "").map((line) => line.length - line.trimStart().length));
    if (!Number.isFinite(margin) || margin === 0) return lines.join("\n");
    return lines.map((line) => (line.trim() === "" ? "" : line.slice(margin))).join("\n");
}
