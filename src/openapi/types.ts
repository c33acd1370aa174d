/**
 * Input boundary: an already-parsed OpenAPI 3.0 document
 */
import type { OpenAPIV3 } from "openapi-types";

export type OpenApiDocument = OpenAPIV3.Document;
export type SchemaObject = OpenAPIV3.SchemaObject;
export type ReferenceObject = OpenAPIV3.ReferenceObject;
export type SchemaOrRef = SchemaObject | ReferenceObject;
export type ParameterObject = OpenAPIV3.ParameterObject;
export type ResponseObject = OpenAPIV3.ResponseObject;
export type RequestBodyObject = OpenAPIV3.RequestBodyObject;
export type MediaTypeObject = OpenAPIV3.MediaTypeObject;
export type OperationObject = OpenAPIV3.OperationObject;
export type PathItemObject = OpenAPIV3.PathItemObject;

export const JSON_MEDIA_TYPE = "application/json";

export function isReference(value: object): value is ReferenceObject {
    return "$ref" in value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check the top-level shape of a parsed document. Everything below `paths` and
 * `components` is validated by the compiler itself.
 */
export function assertOpenApiDocument(value: unknown): asserts value is OpenApiDocument {
    if (!isRecord(value)) {
        throw new TypeError("OpenAPI document must be an object");
    }
    if (typeof value.openapi !== "string" || !value.openapi.startsWith("3.0")) {
        throw new TypeError(`Unsupported OpenAPI version: ${String(value.openapi)}. Only 3.0.x is supported`);
    }
    if (!isRecord(value.info)) {
        throw new TypeError("OpenAPI document is missing 'info'");
    }
    if (!isRecord(value.paths)) {
        throw new TypeError("OpenAPI document is missing 'paths'");
    }
    if (value.components !== undefined && !isRecord(value.components)) {
        throw new TypeError("OpenAPI 'components' must be an object");
    }
}
