/**
 * OpenAPI schema to IR converter
 *
 * Turns component schemas into the `TypeMap`. Object schemas become structs,
 * references become `IRNamed` leaves that are never expanded here.
 */
import { CodegenError } from "../../errors";
import { parseIdentifier, parseTypeName } from "../../names";
import { isReference, type SchemaObject, type SchemaOrRef } from "../../openapi/types";
import { MAX_REFERENCE_DEPTH, resolveSchemaRef, schemaMetadata, type ResolveContext } from "../../resolver";
import type { IRField, IRMetadata, IRStruct, IRStructOrType, IRType, TypeDefinition, TypeMap } from "../types";
import { createAny, createArray, createNamed, createOptional, createPrimitive } from "../utils";

/**
 * Build the IR for one schema. Inline objects come back as `IRStruct`; callers
 * that cannot hold an anonymous struct pass the result through `discardStruct`.
 */
export function buildType(schema: SchemaOrRef, ctx: ResolveContext, depth = 0): IRStructOrType {
    if (isReference(schema)) {
        const resolved = resolveSchemaRef(schema.$ref, ctx);
        return createNamed(resolved.name, resolved.metadata);
    }

    const metadata = schemaMetadata(schema);

    if (schema.oneOf || schema.anyOf || schema.not) {
        throw new CodegenError("UnsupportedKind", describeSchema(schema));
    }

    if (schema.allOf) {
        return withMetadata(mergeAllOf(schema.allOf, ctx, depth), metadata);
    }

    switch (schema.type) {
        case "string":
        case "number":
        case "integer":
        case "boolean":
            return createPrimitive(schema.type, metadata);
        case "array": {
            // `items` is required by the type, but descriptions are not always typed
            const items: SchemaOrRef | undefined = schema.items;
            if (!items) {
                throw new CodegenError("UnsupportedKind", "array without 'items'");
            }
            return createArray(discardStruct(buildType(items, ctx, depth)), metadata);
        }
        case "object":
            return fromObjectLike(schema, ctx, depth);
        case undefined:
            if (!schema.properties && !schema.required) {
                return createAny(metadata);
            }
            return fromObjectLike(schema, ctx, depth);
        default:
            throw new CodegenError("UnsupportedKind", describeSchema(schema));
    }
}

function withMetadata(struct: IRStruct, metadata: IRMetadata): IRStruct {
    return Object.keys(metadata).length > 0 ? { ...struct, metadata: { ...struct.metadata, ...metadata } } : struct;
}

function describeSchema(schema: SchemaObject): string {
    if (schema.oneOf) return "oneOf";
    if (schema.anyOf) return "anyOf";
    if (schema.not) return "not";
    return `type '${String(schema.type)}'`;
}

/**
 * Reject anonymous structs where only a named or scalar type can go
 */
export function discardStruct(value: IRStructOrType): IRType {
    if (value.kind === "struct") {
        const fields = value.fields.map((f) => f.wireName).join(", ");
        throw new CodegenError("NotStructurallyTyped", `{ ${fields} }`);
    }
    return value;
}

/**
 * Build a struct from the declared properties of an object schema, in declared
 * order. Properties missing from `required` are wrapped in `Optional`.
 */
export function fromObjectLike(schema: SchemaObject, ctx: ResolveContext, depth = 0): IRStruct {
    const required = new Set(schema.required ?? []);
    const fields: IRField[] = [];

    for (const [wireName, propSchema] of Object.entries(schema.properties ?? {})) {
        const name = parseIdentifier(wireName);
        if (fields.some((f) => f.name.equals(name))) {
            throw new CodegenError("DuplicateName", wireName);
        }

        const isRequired = required.has(wireName);
        const inner = discardStruct(buildType(propSchema, ctx, depth));
        const field: IRField = {
            name,
            wireName,
            type: isRequired ? inner : createOptional(inner),
            required: isRequired,
        };
        if (!isReference(propSchema) && propSchema.description) field.description = propSchema.description;
        fields.push(field);
    }

    return createStruct(fields, schemaMetadata(schema));
}

export function createStruct(fields: IRField[], metadata?: IRMetadata): IRStruct {
    if (fields.length === 0) {
        throw new CodegenError("EmptyStruct", "object schema declares no properties");
    }
    const struct: IRStruct = { kind: "struct", fields };
    if (metadata && Object.keys(metadata).length > 0) struct.metadata = metadata;
    return struct;
}

/**
 * Merge the constituents of an `allOf` into one struct. Referenced constituents
 * are followed to the schema they name; every constituent has to be an object.
 * `depth` counts merges entered through references and is bounded like
 * reference chains.
 */
export function mergeAllOf(schemas: SchemaOrRef[], ctx: ResolveContext, depth = 0): IRStruct {
    if (depth >= MAX_REFERENCE_DEPTH) {
        throw new CodegenError("BadReference", `allOf nested more than ${MAX_REFERENCE_DEPTH} levels`);
    }

    const fields: IRField[] = [];
    for (const constituent of schemas) {
        const struct = constituentStruct(constituent, ctx, depth);
        for (const field of struct.fields) {
            if (fields.some((f) => f.name.equals(field.name))) {
                throw new CodegenError("DuplicateName", field.wireName);
            }
            fields.push(field);
        }
    }
    return createStruct(fields);
}

function constituentStruct(constituent: SchemaOrRef, ctx: ResolveContext, depth: number): IRStruct {
    let schema: SchemaObject;
    let label: string;
    if (isReference(constituent)) {
        schema = resolveSchemaRef(constituent.$ref, ctx).schema;
        label = constituent.$ref;
    } else {
        schema = constituent;
        label = "inline schema";
    }

    if (schema.allOf) {
        return mergeAllOf(schema.allOf, ctx, depth + 1);
    }

    const built = buildType(schema, ctx, depth + 1);
    if (built.kind !== "struct") {
        throw new CodegenError("UnsupportedMerge", `${label} is a ${built.kind} type`);
    }
    return built;
}

/**
 * Convert every entry of `components.schemas`, in declaration order.
 */
export function gatherTypes(ctx: ResolveContext): TypeMap {
    const types = new Map<string, TypeDefinition>();

    for (const [key, schema] of Object.entries(ctx.tables.schemas)) {
        ctx.logger.log("Processing schema:", key);
        const name = parseTypeName(key);
        types.set(name.value, { name, definition: buildType(schema, ctx) });
    }

    return types;
}
