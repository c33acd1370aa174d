/**
 * Intermediate Representation (IR) for routewright
 *
 * The IR is the only thing the emitters see:
 * - `TypeMap`: every component schema, by name
 * - `RouteTable`: every operation, grouped by path template
 *
 * Both are built once per compilation and never mutated afterwards. Named types
 * are referenced by name (`IRNamed`) rather than by pointer, so self-referential
 * schemas never produce a cyclic structure.
 */
import type { Identifier, TypeName } from "../names";

/**
 * Metadata that can be attached to any IR type node
 */
export interface IRMetadata {
    /** Human-readable description */
    description?: string;
    /** The source schema was marked `nullable` */
    nullable?: boolean;
}

export type IRPrimitiveType = "string" | "number" | "integer" | "boolean";

export interface IRTypeBase {
    kind: string;
    metadata?: IRMetadata;
}

export interface IRPrimitive extends IRTypeBase {
    kind: "primitive";
    primitiveType: IRPrimitiveType;
}

export interface IRArray extends IRTypeBase {
    kind: "array";
    items: IRType;
}

/**
 * Never wraps another `IROptional` (see `createOptional`)
 */
export interface IROptional extends IRTypeBase {
    kind: "optional";
    inner: IRType;
}

/**
 * Reference to a type in the `TypeMap`
 */
export interface IRNamed extends IRTypeBase {
    kind: "named";
    name: TypeName;
}

export interface IRAny extends IRTypeBase {
    kind: "any";
}

export type IRType = IRPrimitive | IRArray | IROptional | IRNamed | IRAny;

export interface IRField {
    name: Identifier;
    /** Property key as written in the description (the JSON wire name) */
    wireName: string;
    type: IRType;
    required: boolean;
    description?: string;
}

/**
 * An anonymous record. Only ever appears as a `TypeMap` entry.
 */
export interface IRStruct {
    kind: "struct";
    fields: readonly IRField[];
    metadata?: IRMetadata;
}

export type IRStructOrType = IRStruct | IRType;

export interface TypeDefinition {
    name: TypeName;
    definition: IRStructOrType;
}

export type TypeMap = ReadonlyMap<string, TypeDefinition>;

export type PathSegment =
    | { kind: "literal"; value: string }
    | { kind: "parameter"; name: string; identifier: Identifier };

export type RoutePath = readonly PathSegment[];

export const BODYLESS_VERBS = ["GET", "HEAD", "OPTIONS", "TRACE"] as const;
export const BODY_CARRYING_VERBS = ["POST", "PUT", "PATCH", "DELETE"] as const;

export type BodylessVerb = (typeof BODYLESS_VERBS)[number];
export type BodyCarryingVerb = (typeof BODY_CARRYING_VERBS)[number];
export type HttpVerb = BodylessVerb | BodyCarryingVerb;

export type HttpMethod = { verb: BodylessVerb; carriesBody: false } | { verb: BodyCarryingVerb; carriesBody: true };

/**
 * How a path or query parameter is decoded from its string form
 */
export type ParamCodec = { kind: "scalar"; primitive: IRPrimitiveType } | { kind: "list"; primitive: IRPrimitiveType };

export interface RouteParam {
    name: Identifier;
    /** Name used in the URL */
    wireName: string;
    /** `Optional`-wrapped for non-required query parameters */
    type: IRType;
    required: boolean;
    codec: ParamCodec;
    description?: string;
}

export interface RequestBody {
    /** `Optional`-wrapped unless the body is required */
    type: IRType;
    required: boolean;
}

export interface RouteResponse {
    status: number;
    type?: IRType;
    description?: string;
}

export interface RouteErrorResponse extends RouteResponse {
    /** Error taxonomy name, derived from the reason phrase */
    name: TypeName;
}

/**
 * A single validated operation. A `Route` only exists if every check passed.
 */
export interface Route {
    operationId: Identifier;
    method: HttpMethod;
    /** Path template as written in the description */
    path: string;
    segments: RoutePath;
    pathParams: readonly RouteParam[];
    queryParams: readonly RouteParam[];
    body?: RequestBody;
    success: RouteResponse;
    errors: readonly RouteErrorResponse[];
    description?: string;
    deprecated?: boolean;
}

export type RouteTable = ReadonlyMap<string, readonly Route[]>;

/**
 * The complete model handed to emitters
 */
export interface IRModel {
    types: TypeMap;
    routes: RouteTable;
    /** First server URL of the description, if any */
    baseUrl?: string;
}
