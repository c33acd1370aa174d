/**
 * OpenAPI paths to IR converter
 *
 * Every operation of the description becomes a validated `Route`. Any problem
 * aborts the whole table: a `Route` that exists is internally consistent.
 */
import { STATUS_CODES } from "http";

import { CodegenError } from "../../errors";
import { parseIdentifier, parseTypeName, toPascalCase, type Identifier, type TypeName } from "../../names";
import {
    JSON_MEDIA_TYPE,
    type MediaTypeObject,
    type OpenApiDocument,
    type OperationObject,
    type ParameterObject,
    type PathItemObject,
    type ReferenceObject,
    type RequestBodyObject,
    type ResponseObject,
    type SchemaOrRef,
} from "../../openapi/types";
import { dereference, type ResolveContext } from "../../resolver";
import {
    BODY_CARRYING_VERBS,
    BODYLESS_VERBS,
    type HttpMethod,
    type IRType,
    type ParamCodec,
    type PathSegment,
    type RequestBody,
    type Route,
    type RouteErrorResponse,
    type RouteParam,
    type RoutePath,
    type RouteResponse,
    type RouteTable,
    type TypeMap,
} from "../types";
import { createOptional, pathShape, unwrapOptional } from "../utils";
import { buildType, discardStruct } from "./schema-to-ir";

/** Order in which the operations of a path item are visited */
const OPERATION_KEYS = ["get", "post", "put", "patch", "delete", "head", "options", "trace"] as const;

const LITERAL_SEGMENT = /^[A-Za-z]+$/;
const PARAMETER_SEGMENT = /^\{([A-Za-z]+)\}$/;

/**
 * Parse a path template into segments.
 *
 * Segments are either purely alphabetic literals or a single `{name}`
 * placeholder. Digits are rejected, even though they are valid in URLs.
 * Empty segments (a trailing slash) are skipped.
 */
export function analysePath(raw: string): RoutePath {
    if (!raw.startsWith("/")) {
        throw new CodegenError("MalformedPath", raw);
    }

    const segments: PathSegment[] = [];
    for (const segment of raw.split("/").slice(1)) {
        if (segment === "") continue;

        if (LITERAL_SEGMENT.test(segment)) {
            segments.push({ kind: "literal", value: segment });
            continue;
        }

        const name = PARAMETER_SEGMENT.exec(segment)?.[1];
        if (name === undefined) {
            throw new CodegenError("MalformedPath", raw);
        }

        let identifier: Identifier;
        try {
            identifier = parseIdentifier(name);
        } catch (error) {
            throw new CodegenError("MalformedPath", raw, { cause: error });
        }
        if (segments.some((s) => s.kind === "parameter" && s.identifier.equals(identifier))) {
            throw new CodegenError("MalformedPath", raw);
        }
        segments.push({ kind: "parameter", name, identifier });
    }

    return segments;
}

function isBodyless(verb: string): verb is (typeof BODYLESS_VERBS)[number] {
    return BODYLESS_VERBS.some((v) => v === verb);
}

function isBodyCarrying(verb: string): verb is (typeof BODY_CARRYING_VERBS)[number] {
    return BODY_CARRYING_VERBS.some((v) => v === verb);
}

/**
 * Classify an HTTP verb (case-insensitive) as body-less or body-carrying
 */
export function classifyMethod(verb: string): HttpMethod {
    const upper = verb.toUpperCase();
    if (isBodyless(upper)) return { verb: upper, carriesBody: false };
    if (isBodyCarrying(upper)) return { verb: upper, carriesBody: true };
    throw new CodegenError("UnsupportedKind", `HTTP method '${verb}'`);
}

/**
 * Error taxonomy name for a status code: its reason phrase in PascalCase
 * (`404` → `NotFound`), or `E<code>` when there is no usable phrase.
 */
export function errorTypeName(status: number): TypeName {
    const phrase = lookupReason(status);
    if (phrase !== undefined) {
        try {
            return parseTypeName(toPascalCase(phrase));
        } catch {
            // phrase does not survive normalization, e.g. "I'm a Teapot"
        }
    }
    return parseTypeName(`E${status}`);
}

/**
 * Reason phrase of a status code, as Node's HTTP server sends it
 */
export function lookupReason(status: number): string | undefined {
    return STATUS_CODES[status];
}

/**
 * Build the route table, in path declaration order.
 */
export function gatherRoutes(document: OpenApiDocument, ctx: ResolveContext, types: TypeMap): RouteTable {
    const routes = new Map<string, Route[]>();
    const shapes = new Map<string, string>();
    const operationIds = new Map<string, string>();

    ctx.logger.log("Found paths:", Object.keys(document.paths));

    for (const [path, pathItem] of Object.entries(document.paths)) {
        if (pathItem === undefined) continue;
        ctx.logger.log("Processing path:", path);

        if (pathItem.$ref !== undefined) {
            throw new CodegenError("UnexpectedReference", pathItem.$ref);
        }

        const segments = analysePath(path);
        const shape = pathShape(segments);
        const clash = shapes.get(shape);
        if (clash !== undefined) {
            throw new CodegenError("DuplicateName", `${path} (same route as ${clash})`);
        }
        shapes.set(shape, path);

        const pathRoutes: Route[] = [];
        for (const key of OPERATION_KEYS) {
            const operation = pathItem[key];
            if (!operation) continue;

            const route = buildRoute(path, segments, key, operation, pathItem, ctx, types);
            const previous = operationIds.get(route.operationId.value);
            if (previous !== undefined) {
                throw new CodegenError(
                    "DuplicateName",
                    `operationId '${operation.operationId ?? ""}' used by ${previous} and ${describeOp(key, path)}`,
                );
            }
            operationIds.set(route.operationId.value, describeOp(key, path));

            ctx.logger.log("Add route:", describeOp(key, path), "->", route.operationId.value);
            pathRoutes.push(route);
        }

        if (pathRoutes.length === 0) {
            ctx.logger.log("Skipping path without operations:", path);
            continue;
        }
        routes.set(path, pathRoutes);
    }

    return routes;
}

function describeOp(verb: string, path: string): string {
    return `${verb.toUpperCase()} ${path}`;
}

function buildRoute(
    path: string,
    segments: RoutePath,
    verb: string,
    operation: OperationObject,
    pathItem: PathItemObject,
    ctx: ResolveContext,
    types: TypeMap,
): Route {
    const label = describeOp(verb, path);
    if (!operation.operationId) {
        throw new CodegenError("NoOperationId", label);
    }
    const operationId = parseIdentifier(operation.operationId);
    const method = classifyMethod(verb);

    const { pathParams, queryParams } = analyseParameters(
        collectParameters(pathItem.parameters ?? [], operation.parameters ?? [], ctx),
        segments,
        label,
        ctx,
        types,
    );

    let body: RequestBody | undefined;
    if (operation.requestBody) {
        if (!method.carriesBody) {
            throw new CodegenError("UnexpectedBody", `${label} cannot carry a request body`);
        }
        body = analyseRequestBody(operation.requestBody, label, ctx);
    }

    const { success, errors } = classifyResponses(operation.responses ?? {}, label, ctx);

    const route: Route = {
        operationId,
        method,
        path,
        segments,
        pathParams,
        queryParams,
        success,
        errors,
    };
    if (body) route.body = body;

    const description = [operation.summary, operation.description].filter(Boolean).join("\n\n");
    if (description) route.description = description;
    if (operation.deprecated) route.deprecated = true;

    return route;
}

/**
 * Path item parameters followed by operation parameters; an operation
 * parameter with the same `name` and `in` replaces the inherited one in place.
 */
function collectParameters(
    inherited: (ParameterObject | ReferenceObject)[],
    own: (ParameterObject | ReferenceObject)[],
    ctx: ResolveContext,
): ParameterObject[] {
    const params = inherited.map((p) => dereference(p, "parameters", ctx));

    for (const item of own) {
        const param = dereference(item, "parameters", ctx);
        const index = params.findIndex((p) => p.name === param.name && p.in === param.in);
        if (index === -1) {
            params.push(param);
        } else {
            params[index] = param;
        }
    }

    return params;
}

function analyseParameters(
    params: ParameterObject[],
    segments: RoutePath,
    label: string,
    ctx: ResolveContext,
    types: TypeMap,
): { pathParams: RouteParam[]; queryParams: RouteParam[] } {
    const pathParams: RouteParam[] = [];
    const queryParams: RouteParam[] = [];

    for (const param of params) {
        const name = parseIdentifier(param.name);
        if ([...pathParams, ...queryParams].some((p) => p.name.equals(name))) {
            throw new CodegenError("DuplicateName", `parameter '${param.name}' of ${label}`);
        }
        if (param.in !== "path" && param.in !== "query") {
            throw new CodegenError("UnsupportedParameter", `${param.in} parameter '${param.name}' of ${label}`);
        }
        if (!param.schema) {
            throw new CodegenError("UnsupportedParameter", `'${param.name}' of ${label} has no schema`);
        }

        const type = discardStruct(buildType(param.schema, ctx));
        const codec = paramCodec(type, types, `'${param.name}' of ${label}`);
        const required = param.required === true;

        const routeParam: RouteParam = {
            name,
            wireName: param.name,
            type,
            required,
            codec,
        };
        if (param.description) routeParam.description = param.description;

        if (param.in === "path") {
            if (!required) {
                throw new CodegenError("UnsupportedParameter", `path parameter '${param.name}' must be required`);
            }
            pathParams.push(routeParam);
        } else {
            if (!required) routeParam.type = createOptional(type);
            queryParams.push(routeParam);
        }
    }

    checkPathBinding(pathParams, segments, label);
    return { pathParams, queryParams };
}

/**
 * Path parameters and `{name}` placeholders must match one to one, by the name
 * as written: the router binds `{petId}` to `petId`, never to `pet_id`.
 */
function checkPathBinding(pathParams: RouteParam[], segments: RoutePath, label: string): void {
    const placeholders = segments.flatMap((s) => (s.kind === "parameter" ? [s] : []));

    for (const placeholder of placeholders) {
        if (!pathParams.some((p) => p.wireName === placeholder.name)) {
            throw new CodegenError("PathParameterMismatch", `${label}: '{${placeholder.name}}' is not declared`);
        }
    }
    for (const param of pathParams) {
        if (!placeholders.some((s) => s.name === param.wireName)) {
            throw new CodegenError("PathParameterMismatch", `${label}: '${param.wireName}' is not in the path`);
        }
    }
}

/**
 * Follow named aliases through the `TypeMap` until a non-named type (or a
 * struct's name) is reached
 */
function resolveAlias(type: IRType, types: TypeMap, seen = new Set<string>()): IRType {
    if (type.kind !== "named" || seen.has(type.name.value)) return type;
    seen.add(type.name.value);
    const def = types.get(type.name.value)?.definition;
    return def && def.kind !== "struct" ? resolveAlias(def, types, seen) : type;
}

/**
 * Work out how a parameter is decoded from the URL
 */
function paramCodec(type: IRType, types: TypeMap, label: string): ParamCodec {
    const inner = resolveAlias(unwrapOptional(type), types);
    if (inner.kind === "primitive") {
        return { kind: "scalar", primitive: inner.primitiveType };
    }
    if (inner.kind === "array") {
        const item = resolveAlias(inner.items, types);
        if (item.kind === "primitive") return { kind: "list", primitive: item.primitiveType };
    }
    throw new CodegenError("UnsupportedParameter", `${label} must be a primitive or an array of primitives`);
}

function analyseRequestBody(
    item: RequestBodyObject | ReferenceObject,
    label: string,
    ctx: ResolveContext,
): RequestBody {
    const requestBody = dereference(item, "requestBodies", ctx);
    const type = discardStruct(buildType(jsonSchemaOf(requestBody.content, `request body of ${label}`), ctx));
    const required = requestBody.required === true;
    return { type: required ? type : createOptional(type), required };
}

/**
 * The schema of the single `application/json` media type of `content`
 */
function jsonSchemaOf(content: Record<string, MediaTypeObject>, label: string): SchemaOrRef {
    const mediaTypes = Object.keys(content);
    const media = content[JSON_MEDIA_TYPE];
    if (mediaTypes.length !== 1 || media === undefined) {
        throw new CodegenError("UnsupportedContentType", `${label} declares ${mediaTypes.join(", ") || "nothing"}`);
    }
    if (!media.schema) {
        throw new CodegenError("MissingSchema", label);
    }
    return media.schema;
}

const STATUS_CODE = /^\d{3}$/;

/**
 * Split a response table into exactly one success response, in [200, 300],
 * and any number of error responses, in [400, 500].
 */
function classifyResponses(
    responses: Record<string, ResponseObject | ReferenceObject>,
    label: string,
    ctx: ResolveContext,
): { success: RouteResponse; errors: RouteErrorResponse[] } {
    let success: RouteResponse | undefined;
    const errors: RouteErrorResponse[] = [];

    for (const [code, item] of Object.entries(responses)) {
        if (!STATUS_CODE.test(code)) {
            throw new CodegenError("BadStatusCode", `${code} in ${label}`);
        }
        const status = Number(code);
        const response = dereference(item, "responses", ctx);

        if (status >= 200 && status <= 300) {
            if (success) {
                throw new CodegenError("MultipleSuccessCodes", `${success.status} and ${status} in ${label}`);
            }
            success = analyseResponse(status, response, label, ctx);
        } else if (status >= 400 && status <= 500) {
            errors.push({ ...analyseResponse(status, response, label, ctx), name: errorTypeName(status) });
        } else {
            throw new CodegenError("BadStatusCode", `${code} in ${label}`);
        }
    }

    if (!success) {
        throw new CodegenError("MissingSuccessCode", label);
    }
    return { success, errors };
}

function analyseResponse(status: number, response: ResponseObject, label: string, ctx: ResolveContext): RouteResponse {
    const where = `${status} response of ${label}`;
    if (response.headers && Object.keys(response.headers).length > 0) {
        throw new CodegenError("UnsupportedResponse", `${where} declares headers`);
    }
    if (response.links && Object.keys(response.links).length > 0) {
        throw new CodegenError("UnsupportedResponse", `${where} declares links`);
    }

    const result: RouteResponse = { status };
    if (response.description) result.description = response.description;
    if (response.content && Object.keys(response.content).length > 0) {
        result.type = discardStruct(buildType(jsonSchemaOf(response.content, where), ctx));
    }
    return result;
}
