/**
 * Naming and signature contract shared by every emitter
 *
 * An operation is known by the same member name in the service interface, the
 * dispatcher, the routing table and the client. All of them go through
 * `memberName`, so the generated files always agree with each other.
 */
import { CodegenError } from "../errors";
import type { IRModel, IRType, Route } from "../ir/types";
import { allRoutes, isOptional, unwrapOptional } from "../ir/utils";
import { toMixedCase, toPascalCase, type Identifier } from "../names";
import reservedWords from "../data/reserved-words.json";

/** Names the emitters declare themselves */
export const API_INTERFACE = "Api";
export const RESULT_TYPE = "Result";
export const CLIENT_CLASS = "ApiClient";
export const CLIENT_OPTIONS = "ApiClientOptions";
export const DISPATCH_REQUEST = "DispatchRequest";
export const DISPATCH_RESPONSE = "DispatchResponse";
export const DISPATCH_HANDLER = "DispatchHandler";
export const ROUTE_BINDING = "RouteBinding";
export const OPERATION_NAME = "OperationName";
export const BAD_REQUEST_ERROR = "BadRequestError";
export const UNEXPECTED_STATUS_ERROR = "UnexpectedStatusError";
export const SERVE_OPTIONS = "ServeOptions";

const EMITTED_TYPE_NAMES = [
    API_INTERFACE,
    RESULT_TYPE,
    CLIENT_CLASS,
    CLIENT_OPTIONS,
    DISPATCH_REQUEST,
    DISPATCH_RESPONSE,
    DISPATCH_HANDLER,
    ROUTE_BINDING,
    OPERATION_NAME,
    BAD_REQUEST_ERROR,
    UNEXPECTED_STATUS_ERROR,
    SERVE_OPTIONS,
];

/** Globals the emitted code refers to; a model type of the same name would shadow them in a single unit */
const GLOBAL_NAMES = ["Array", "Error", "JSON", "Number", "Object", "Promise", "Record", "String", "URL"];

/** Locals, helpers and client members referenced inside generated method bodies */
const GENERATED_LOCALS = [
    "api",
    "req",
    "result",
    "httpResponse",
    "single",
    "list",
    "required",
    "optional",
    "decodeString",
    "decodeNumber",
    "decodeInteger",
    "decodeBoolean",
    "send",
    "baseUrl",
    "fetchFn",
    "headers",
    "constructor",
];

const RESERVED = new Set<string>([...reservedWords, ...GENERATED_LOCALS]);

/**
 * mixedCase member name; reserved words get a trailing underscore
 */
export function memberName(id: Identifier): string {
    const name = toMixedCase(id.value);
    return RESERVED.has(name) ? `${name}_` : name;
}

/**
 * Name of the union of error variants of a route, e.g. `GetPetError`
 */
export function errorUnionName(route: Route): string {
    return `${toPascalCase(route.operationId.value)}Error`;
}

/**
 * Name of the body parameter: the camelCased type name for named bodies
 * (`NewPet` → `newPet`), `payload` otherwise.
 */
export function bodyParamName(route: Route): string | undefined {
    if (!route.body) return undefined;
    const inner = unwrapOptional(route.body.type);
    if (inner.kind !== "named") return "payload";
    const name = toMixedCase(inner.name.value);
    return RESERVED.has(name) ? `${name}_` : name;
}

/**
 * How references to model types are written (`Models.Pet` in separate files,
 * `Pet` in a single unit)
 */
export type TypeQualifier = (name: string) => string;

export const unqualified: TypeQualifier = (name) => name;

/**
 * TypeScript spelling of an IR type
 */
export function renderType(type: IRType, qualify: TypeQualifier = unqualified): string {
    const nullable = type.metadata?.nullable === true && type.kind !== "named";
    let rendered: string;

    switch (type.kind) {
        case "primitive":
            rendered = type.primitiveType === "integer" ? "number" : type.primitiveType;
            break;
        case "array": {
            const items = renderType(type.items, qualify);
            rendered = /[|&]/.test(items) ? `(${items})[]` : `${items}[]`;
            break;
        }
        case "optional":
            rendered = `${renderType(type.inner, qualify)} | undefined`;
            break;
        case "named":
            rendered = qualify(type.name.value);
            break;
        case "any":
            rendered = "unknown";
            break;
    }

    return nullable ? `${rendered} | null` : rendered;
}

export interface SignatureParam {
    name: string;
    type: IRType;
    source: "path" | "query" | "body";
    /** The wire name for path and query parameters */
    wireName?: string;
    /** Rendered with `?` */
    optional: boolean;
}

/**
 * Parameters of the service method for a route: path parameters, then query
 * parameters, then the body. Only a trailing run of optional parameters is
 * written with `?`; an optional parameter before a required one is typed
 * `T | undefined` instead.
 */
export function parameterList(route: Route): SignatureParam[] {
    const params: SignatureParam[] = [
        ...route.pathParams.map((p) => ({
            name: memberName(p.name),
            type: p.type,
            source: "path" as const,
            wireName: p.wireName,
            optional: false,
        })),
        ...route.queryParams.map((p) => ({
            name: memberName(p.name),
            type: p.type,
            source: "query" as const,
            wireName: p.wireName,
            optional: false,
        })),
    ];

    const bodyName = bodyParamName(route);
    if (route.body && bodyName) {
        params.push({ name: bodyName, type: route.body.type, source: "body", optional: false });
    }

    for (let i = params.length - 1; i >= 0; i--) {
        const param = params[i];
        if (!param || !isOptional(param.type)) break;
        param.optional = true;
    }

    return params;
}

export function renderParameters(params: SignatureParam[], qualify: TypeQualifier = unqualified): string {
    return params
        .map((p) =>
            p.optional
                ? `${p.name}?: ${renderType(unwrapOptional(p.type), qualify)}`
                : `${p.name}: ${renderType(p.type, qualify)}`,
        )
        .join(", ");
}

export function successType(route: Route, qualify: TypeQualifier = unqualified): string {
    return route.success.type ? renderType(route.success.type, qualify) : "void";
}

/**
 * `T` when the route has no error responses, `Result<T, <Op>Error>` otherwise
 */
export function returnType(route: Route, qualify: TypeQualifier = unqualified): string {
    const ok = successType(route, qualify);
    return route.errors.length === 0 ? ok : `${RESULT_TYPE}<${ok}, ${errorUnionName(route)}>`;
}

/**
 * Model type names referenced by `types`, sorted
 */
export function referencedTypeNames(types: (IRType | undefined)[]): string[] {
    const names = new Set<string>();
    const visit = (type: IRType): void => {
        switch (type.kind) {
            case "named":
                names.add(type.name.value);
                break;
            case "array":
                visit(type.items);
                break;
            case "optional":
                visit(type.inner);
                break;
            case "primitive":
            case "any":
                break;
        }
    };
    for (const type of types) {
        if (type) visit(type);
    }
    return Array.from(names).sort();
}

/**
 * Every type a route mentions, in signature order
 */
export function routeTypes(route: Route): IRType[] {
    const types: IRType[] = [...route.pathParams.map((p) => p.type), ...route.queryParams.map((p) => p.type)];
    if (route.body) types.push(route.body.type);
    if (route.success.type) types.push(route.success.type);
    for (const error of route.errors) {
        if (error.type) types.push(error.type);
    }
    return types;
}

/**
 * Reject models whose emitted names would clash: a model type named like an
 * emitted helper, a global the emitted code uses or an error union; two routes
 * with the same member name; or a parameter sharing its name with another one
 * of the same method.
 */
export function checkEmittedNames(model: IRModel): void {
    const taken = new Map<string, string>();
    const claim = (name: string, owner: string): void => {
        const previous = taken.get(name);
        if (previous !== undefined) {
            throw new CodegenError("DuplicateName", `${name} (${previous} and ${owner})`);
        }
        taken.set(name, owner);
    };

    for (const name of EMITTED_TYPE_NAMES) claim(name, "generated helper");
    for (const name of GLOBAL_NAMES) claim(name, "global");
    for (const name of model.types.keys()) claim(name, `schema ${name}`);

    const members = new Map<string, string>();
    for (const route of allRoutes(model.routes)) {
        claim(errorUnionName(route), `error union of ${route.operationId.source}`);

        const member = memberName(route.operationId);
        const previous = members.get(member);
        if (previous !== undefined) {
            throw new CodegenError("DuplicateName", `${member} (${previous} and ${route.operationId.source})`);
        }
        members.set(member, route.operationId.source);

        const params = new Set<string>();
        for (const param of parameterList(route)) {
            if (params.has(param.name)) {
                throw new CodegenError("DuplicateName", `parameter ${param.name} of ${route.operationId.source}`);
            }
            params.add(param.name);
        }
    }
}
