/**
 * Utility functions for working with IR types
 */
import type {
    IRAny,
    IRArray,
    IRMetadata,
    IRNamed,
    IROptional,
    IRPrimitive,
    IRPrimitiveType,
    IRType,
    Route,
    RoutePath,
    RouteTable,
} from "./types";
import type { TypeName } from "../names";

export function createPrimitive(primitiveType: IRPrimitiveType, metadata?: IRMetadata): IRPrimitive {
    return { kind: "primitive", primitiveType, metadata };
}

export function createArray(items: IRType, metadata?: IRMetadata): IRArray {
    return { kind: "array", items, metadata };
}

/**
 * Wrap a type in `Optional`; an already optional type is returned as is.
 */
export function createOptional(inner: IRType, metadata?: IRMetadata): IROptional {
    if (inner.kind === "optional") {
        return metadata ? { ...inner, metadata: { ...inner.metadata, ...metadata } } : inner;
    }
    return { kind: "optional", inner, metadata };
}

export function createNamed(name: TypeName, metadata?: IRMetadata): IRNamed {
    return { kind: "named", name, metadata };
}

export function createAny(metadata?: IRMetadata): IRAny {
    return { kind: "any", metadata };
}

export function isOptional(type: IRType): type is IROptional {
    return type.kind === "optional";
}

/**
 * Strip a single `Optional` layer
 */
export function unwrapOptional(type: IRType): IRType {
    return type.kind === "optional" ? type.inner : type;
}

/**
 * Render segments back to a template string, e.g. `/pets/{petId}`
 */
export function renderPath(segments: RoutePath): string {
    if (segments.length === 0) return "/";
    return segments.map((s) => "/" + (s.kind === "literal" ? s.value : `{${s.name}}`)).join("");
}

/**
 * Shape of a path with parameter names erased, e.g. `/pets/{}`.
 * Two templates with the same shape cannot be told apart by a router.
 */
export function pathShape(segments: RoutePath): string {
    if (segments.length === 0) return "/";
    return segments.map((s) => "/" + (s.kind === "literal" ? s.value : "{}")).join("");
}

/**
 * All routes of a table in table order
 */
export function allRoutes(routes: RouteTable): Route[] {
    return Array.from(routes.values()).flat();
}
