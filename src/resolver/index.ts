/**
 * Reference resolution
 *
 * Pointers must have the exact shape `#/components/<namespace>/<name>`. Each
 * namespace has its own lookup table and a pointer is only ever looked up in the
 * namespace the caller expects.
 */
import { CodegenError } from "../errors";
import type { IRMetadata } from "../ir/types";
import { silentLogger, type Logger } from "../logger";
import { parseTypeName, type TypeName } from "../names";
import {
    isReference,
    type OpenApiDocument,
    type ParameterObject,
    type ReferenceObject,
    type RequestBodyObject,
    type ResponseObject,
    type SchemaObject,
} from "../openapi/types";

export const NAMESPACES = ["schemas", "parameters", "responses", "requestBodies"] as const;
export type Namespace = (typeof NAMESPACES)[number];

/** Longest chain of schema references followed before giving up */
export const MAX_REFERENCE_DEPTH = 20;

type Lookup<T> = Readonly<Record<string, T | ReferenceObject>>;

/**
 * Read-only bundle of the component tables, passed to every resolution and
 * build call of a compilation.
 */
export interface ResolveContext {
    readonly tables: { readonly [N in Namespace]: Lookup<NamespaceItems[N]> };
    readonly logger: Logger;
}

interface NamespaceItems {
    schemas: SchemaObject;
    parameters: ParameterObject;
    responses: ResponseObject;
    requestBodies: RequestBodyObject;
}

export function createResolveContext(document: OpenApiDocument, logger: Logger = silentLogger): ResolveContext {
    const components = document.components ?? {};
    return {
        tables: {
            schemas: components.schemas ?? {},
            parameters: components.parameters ?? {},
            responses: components.responses ?? {},
            requestBodies: components.requestBodies ?? {},
        },
        logger,
    };
}

export interface ParsedRef {
    namespace: Namespace;
    name: string;
}

function isNamespace(value: string): value is Namespace {
    return NAMESPACES.some((ns) => ns === value);
}

/**
 * Split a pointer into namespace and name, rejecting any other shape.
 */
export function parseRef(ref: string): ParsedRef {
    const parts = ref.split("/");
    const [hash, components, namespace, name] = parts;
    if (
        parts.length !== 4 ||
        hash !== "#" ||
        components !== "components" ||
        namespace === undefined ||
        !isNamespace(namespace) ||
        !name
    ) {
        throw new CodegenError("BadReference", ref);
    }
    return { namespace, name };
}

function expectNamespace(ref: string, namespace: Namespace): string {
    const parsed = parseRef(ref);
    if (parsed.namespace !== namespace) {
        throw new CodegenError("BadReference", ref);
    }
    return parsed.name;
}

/**
 * Own entries only: `toString` and friends are not components
 */
function lookup<T>(table: Lookup<T>, name: string): T | ReferenceObject | undefined {
    return Object.hasOwn(table, name) ? table[name] : undefined;
}

export interface ResolvedSchema {
    /** Name of the schema the pointer designates */
    name: TypeName;
    /** The terminal, non-reference schema of the chain */
    schema: SchemaObject;
    metadata: IRMetadata;
}

/**
 * Resolve a schema pointer, following chains of references up to
 * `MAX_REFERENCE_DEPTH` hops. The returned name is the one the pointer itself
 * designates; the schema and metadata are those at the end of the chain.
 */
export function resolveSchemaRef(ref: string, ctx: ResolveContext): ResolvedSchema {
    const name = parseTypeName(expectNamespace(ref, "schemas"));
    const seen = new Set<string>();

    let current = ref;
    for (let hop = 1; hop <= MAX_REFERENCE_DEPTH; hop++) {
        if (seen.has(current)) {
            throw new CodegenError("BadReference", `${ref} (cyclic via ${current})`);
        }
        seen.add(current);

        const target = lookup(ctx.tables.schemas, expectNamespace(current, "schemas"));
        if (target === undefined) {
            throw new CodegenError("BadReference", current);
        }
        if (!isReference(target)) {
            return { name, schema: target, metadata: schemaMetadata(target) };
        }
        current = target.$ref;
    }

    throw new CodegenError("BadReference", `${ref} (more than ${MAX_REFERENCE_DEPTH} hops)`);
}

/**
 * Return the inline item, or look a pointer up in `namespace`. Only one hop is
 * followed: a table entry that is itself a reference is rejected.
 */
export function dereference<N extends Exclude<Namespace, "schemas">>(
    item: NamespaceItems[N] | ReferenceObject,
    namespace: N,
    ctx: ResolveContext,
): NamespaceItems[N] {
    if (!isReference(item)) {
        return item;
    }
    const table: Lookup<NamespaceItems[N]> = ctx.tables[namespace];
    const target = lookup(table, expectNamespace(item.$ref, namespace));
    if (target === undefined || isReference(target)) {
        throw new CodegenError("BadReference", item.$ref);
    }
    return target;
}

export function schemaMetadata(schema: SchemaObject): IRMetadata {
    const metadata: IRMetadata = {};
    if (schema.description) metadata.description = schema.description;
    if (schema.nullable) metadata.nullable = true;
    return metadata;
}
