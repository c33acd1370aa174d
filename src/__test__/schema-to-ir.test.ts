import { describe, expect, it } from "vitest";

import { buildType, discardStruct, gatherTypes } from "../ir/converters/schema-to-ir";
import type { IRStructOrType, IRType } from "../ir/types";
import { renderType } from "../generator/naming";
import type { SchemaOrRef } from "../openapi/types";
import { createResolveContext } from "../resolver";
import { contextFor, makeDocument, recordingLogger } from "./util";

/** `name: type` per field, with `?` for optional fields */
function describeFields(value: IRStructOrType): string[] {
    if (value.kind !== "struct") throw new Error(`expected a struct, got ${value.kind}`);
    return value.fields.map((f) => `${f.name.value}${f.required ? "" : "?"}: ${renderType(f.type)}`);
}

function typeOf(value: IRStructOrType): IRType {
    return discardStruct(value);
}

const petSchemas: Record<string, SchemaOrRef> = {
    Pet: {
        type: "object",
        required: ["id", "name"],
        properties: {
            id: { type: "integer" },
            name: { type: "string", description: "What the pet answers to" },
            tag: { type: "string" },
        },
    },
};

describe("buildType", () => {
    const ctx = contextFor(petSchemas);

    it("should map primitives", () => {
        expect(buildType({ type: "string" }, ctx)).toMatchObject({ kind: "primitive", primitiveType: "string" });
        expect(buildType({ type: "number" }, ctx)).toMatchObject({ kind: "primitive", primitiveType: "number" });
        expect(buildType({ type: "integer" }, ctx)).toMatchObject({ kind: "primitive", primitiveType: "integer" });
        expect(buildType({ type: "boolean" }, ctx)).toMatchObject({ kind: "primitive", primitiveType: "boolean" });
    });

    it("should keep description and nullable as metadata", () => {
        const built = buildType({ type: "string", description: "A tag", nullable: true }, ctx);
        expect(built.metadata).toEqual({ description: "A tag", nullable: true });
    });

    it("should map a reference to a named leaf", () => {
        const built = typeOf(buildType({ $ref: "#/components/schemas/Pet" }, ctx));
        expect(built.kind).toBe("named");
        expect(renderType(built)).toBe("Pet");
    });

    it("should map arrays of references", () => {
        const built = typeOf(buildType({ type: "array", items: { $ref: "#/components/schemas/Pet" } }, ctx));
        expect(renderType(built)).toBe("Pet[]");
    });

    it("should map a schema without type or properties to Any", () => {
        expect(buildType({}, ctx).kind).toBe("any");
        expect(buildType({ description: "anything" }, ctx)).toMatchObject({
            kind: "any",
            metadata: { description: "anything" },
        });
    });

    it("should reject inline objects where a name is needed", () => {
        expect(() =>
            buildType({ type: "array", items: { type: "object", properties: { a: { type: "string" } } } }, ctx),
        ).toThrow("Inline object schemas must be named: { a }");
    });

    it("should reject combinators other than allOf", () => {
        expect(() => buildType({ oneOf: [{ type: "string" }, { type: "integer" }] }, ctx)).toThrow(
            "Schema not supported: oneOf",
        );
        expect(() => buildType({ anyOf: [{ type: "string" }] }, ctx)).toThrow("Schema not supported: anyOf");
        expect(() => buildType({ not: { type: "string" } }, ctx)).toThrow("Schema not supported: not");
    });
});

describe("fromObjectLike", () => {
    const ctx = contextFor(petSchemas);

    it("should extract fields in declared order, optional when not required", () => {
        const pet = petSchemas.Pet;
        if (!pet) throw new Error("fixture missing");
        expect(describeFields(buildType(pet, ctx))).toEqual(["id: number", "name: string", "tag?: string | undefined"]);
    });

    it("should wrap non-required fields in Optional", () => {
        const built = buildType(
            { type: "object", required: ["id"], properties: { id: { type: "integer" }, tag: { type: "string" } } },
            ctx,
        );
        if (built.kind !== "struct") throw new Error("expected a struct");
        expect(built.fields[0]?.type).toMatchObject({ kind: "primitive", primitiveType: "integer" });
        expect(built.fields[1]?.type).toMatchObject({ kind: "optional", inner: { kind: "primitive" } });
    });

    it("should carry property descriptions onto fields", () => {
        const pet = petSchemas.Pet;
        if (!pet) throw new Error("fixture missing");
        const built = buildType(pet, ctx);
        if (built.kind !== "struct") throw new Error("expected a struct");
        expect(built.fields.map((f) => f.description)).toEqual([undefined, "What the pet answers to", undefined]);
        expect(built.fields.map((f) => f.wireName)).toEqual(["id", "name", "tag"]);
    });

    it("should normalize mixedCase property names", () => {
        const built = buildType({ type: "object", properties: { petId: { type: "integer" } } }, ctx);
        expect(describeFields(built)).toEqual(["pet_id?: number | undefined"]);
    });

    it("should reject object schemas without properties", () => {
        expect(() => buildType({ type: "object" }, ctx)).toThrow("Empty struct");
        expect(() => buildType({ required: ["id"] }, ctx)).toThrow("Empty struct");
    });

    it("should reject two properties with the same identifier", () => {
        expect(() =>
            buildType({ type: "object", properties: { petId: { type: "string" }, pet_id: { type: "string" } } }, ctx),
        ).toThrow("Duplicate name: pet_id");
    });

    it("should reject property names that are not identifiers", () => {
        expect(() => buildType({ type: "object", properties: { "pet-id": { type: "string" } } }, ctx)).toThrow(
            "pet-id is not a valid identifier",
        );
    });
});

describe("allOf", () => {
    const ctx = contextFor({
        Named: { type: "object", required: ["name"], properties: { name: { type: "string" } } },
        Tagged: { type: "object", properties: { tag: { type: "string" } } },
        NamedAgain: { allOf: [{ $ref: "#/components/schemas/Named" }] },
        Label: { type: "string" },
        Loop: { allOf: [{ $ref: "#/components/schemas/Loop" }] },
    });

    it("should merge referenced and inline object schemas", () => {
        const built = buildType(
            {
                allOf: [
                    { $ref: "#/components/schemas/Named" },
                    { type: "object", required: ["id"], properties: { id: { type: "integer" } } },
                ],
            },
            ctx,
        );
        expect(describeFields(built)).toEqual(["name: string", "id: number"]);
    });

    it("should merge through constituents that are merges themselves", () => {
        const built = buildType(
            { allOf: [{ $ref: "#/components/schemas/NamedAgain" }, { $ref: "#/components/schemas/Tagged" }] },
            ctx,
        );
        expect(describeFields(built)).toEqual(["name: string", "tag?: string | undefined"]);
    });

    it("should reject duplicate fields", () => {
        expect(() =>
            buildType({ allOf: [{ $ref: "#/components/schemas/Named" }, { $ref: "#/components/schemas/NamedAgain" }] }, ctx),
        ).toThrow("Duplicate name: name");
    });

    it("should reject constituents that are not objects", () => {
        expect(() =>
            buildType({ allOf: [{ $ref: "#/components/schemas/Named" }, { $ref: "#/components/schemas/Label" }] }, ctx),
        ).toThrow("Structural merge not supported: #/components/schemas/Label is a primitive type");
        expect(() => buildType({ allOf: [{ type: "string" }] }, ctx)).toThrow(
            "Structural merge not supported: inline schema is a primitive type",
        );
    });

    it("should stop on merges that refer to themselves", () => {
        expect(() => buildType({ $ref: "#/components/schemas/Loop" }, ctx)).not.toThrow();
        expect(() => buildType({ allOf: [{ $ref: "#/components/schemas/Loop" }] }, ctx)).toThrow(
            "allOf nested more than 20 levels",
        );
    });
});

describe("gatherTypes", () => {
    it("should convert every schema in declaration order", () => {
        const logger = recordingLogger();
        const ctx = createResolveContext(
            makeDocument(
                {},
                {
                    Node: {
                        type: "object",
                        required: ["children"],
                        properties: { children: { type: "array", items: { $ref: "#/components/schemas/Node" } } },
                    },
                    Nodes: { type: "array", items: { $ref: "#/components/schemas/Node" } },
                },
            ),
            logger,
        );

        const types = gatherTypes(ctx);
        expect(Array.from(types.keys())).toEqual(["Node", "Nodes"]);
        const node = types.get("Node");
        if (!node) throw new Error("Node missing");
        expect(describeFields(node.definition)).toEqual(["children: Node[]"]);
        expect(logger.lines).toEqual(["Processing schema: Node", "Processing schema: Nodes"]);
    });

    it("should reject schema keys that are not type names", () => {
        expect(() => gatherTypes(contextFor({ pet: { type: "string" } }))).toThrow("pet is not a valid type name");
    });
});
