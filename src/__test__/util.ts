import { readFileSync } from "fs";
import { load } from "js-yaml";
import { resolve } from "path";

import { assertOpenApiDocument, type OpenApiDocument, type SchemaOrRef } from "../openapi/types";
import { createResolveContext, type ResolveContext } from "../resolver";

export const PETSTORE_PATH = resolve(__dirname, "fixtures/petstore.yaml");

export function loadPetstore(): OpenApiDocument {
    const document = load(readFileSync(PETSTORE_PATH, "utf8"));
    assertOpenApiDocument(document);
    return document;
}

export function makeDocument(
    paths: OpenApiDocument["paths"],
    schemas: Record<string, SchemaOrRef> = {},
    components: Omit<NonNullable<OpenApiDocument["components"]>, "schemas"> = {},
): OpenApiDocument {
    return {
        openapi: "3.0.3",
        info: { title: "Test", version: "1.0.0" },
        paths,
        components: { ...components, schemas },
    };
}

export function contextFor(schemas: Record<string, SchemaOrRef>): ResolveContext {
    return createResolveContext(makeDocument({}, schemas));
}

/**
 * Records every `log` call as one space-joined line
 */
export function recordingLogger(): { lines: string[]; log(...args: unknown[]): void } {
    const lines: string[] = [];
    return {
        lines,
        log: (...args: unknown[]) => lines.push(args.map(String).join(" ")),
    };
}
