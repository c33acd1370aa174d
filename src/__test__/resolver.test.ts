import { describe, expect, it } from "vitest";

import type { ParameterObject, SchemaOrRef } from "../openapi/types";
import { createResolveContext, dereference, parseRef, resolveSchemaRef } from "../resolver";
import { contextFor, makeDocument } from "./util";

/**
 * `S0` → `S1` → ... → `S<length-1>` → a string schema
 */
function chain(length: number): Record<string, SchemaOrRef> {
    const schemas: Record<string, SchemaOrRef> = {};
    for (let i = 0; i < length - 1; i++) {
        schemas[`S${i}`] = { $ref: `#/components/schemas/S${i + 1}` };
    }
    schemas[`S${length - 1}`] = { type: "string", description: "end of chain" };
    return schemas;
}

describe("parseRef", () => {
    it("should split a component pointer", () => {
        expect(parseRef("#/components/schemas/Pet")).toEqual({ namespace: "schemas", name: "Pet" });
        expect(parseRef("#/components/requestBodies/NewPet")).toEqual({ namespace: "requestBodies", name: "NewPet" });
    });

    it("should reject any other shape", () => {
        for (const ref of [
            "#/definitions/Pet",
            "#/components/schemas/Pet/properties",
            "#/components/things/Pet",
            "#/components/schemas/",
            "other.yaml#/components/schemas/Pet",
            "Pet",
        ]) {
            expect(() => parseRef(ref)).toThrow(`Bad reference: "${ref}"`);
        }
    });
});

describe("resolveSchemaRef", () => {
    it("should return the terminal schema and metadata of a chain", () => {
        const ctx = contextFor({
            Alias: { $ref: "#/components/schemas/Name" },
            Name: { type: "string", description: "A name" },
        });

        const resolved = resolveSchemaRef("#/components/schemas/Alias", ctx);
        expect(resolved.name.value).toBe("Alias");
        expect(resolved.schema).toEqual({ type: "string", description: "A name" });
        expect(resolved.metadata).toEqual({ description: "A name" });
    });

    it("should follow a chain of 20 references", () => {
        // the pointer to S0 plus 19 table entries that are references
        const ctx = contextFor(chain(20));
        expect(resolveSchemaRef("#/components/schemas/S0", ctx).metadata).toEqual({ description: "end of chain" });
    });

    it("should reject a chain of more than 20 references", () => {
        const ctx = contextFor(chain(21));
        expect(() => resolveSchemaRef("#/components/schemas/S0", ctx)).toThrow(
            'Bad reference: "#/components/schemas/S0 (more than 20 hops)"',
        );
    });

    it("should reject cycles", () => {
        const ctx = contextFor({
            A: { $ref: "#/components/schemas/B" },
            B: { $ref: "#/components/schemas/A" },
        });
        expect(() => resolveSchemaRef("#/components/schemas/A", ctx)).toThrow(
            'Bad reference: "#/components/schemas/A (cyclic via #/components/schemas/A)"',
        );
    });

    it("should reject dangling references", () => {
        const ctx = contextFor({ Start: { $ref: "#/components/schemas/Missing" } });
        expect(() => resolveSchemaRef("#/components/schemas/Start", ctx)).toThrow(
            'Bad reference: "#/components/schemas/Missing"',
        );
    });

    it("should never follow a pointer into another namespace", () => {
        const ctx = contextFor({ Pet: { type: "string" } });
        expect(() => resolveSchemaRef("#/components/parameters/Pet", ctx)).toThrow("Bad reference");
    });

    it("should reject pointers whose name is not a type name", () => {
        const ctx = contextFor({ pet: { type: "string" } });
        expect(() => resolveSchemaRef("#/components/schemas/pet", ctx)).toThrow("pet is not a valid type name");
    });
});

describe("dereference", () => {
    const limit: ParameterObject = { name: "limit", in: "query", schema: { type: "integer" } };
    const ctx = createResolveContext(
        makeDocument(
            {},
            {},
            {
                parameters: {
                    Limit: limit,
                    Chained: { $ref: "#/components/parameters/Limit" },
                },
            },
        ),
    );

    it("should return inline items as they are", () => {
        const inline: ParameterObject = { name: "q", in: "query" };
        expect(dereference(inline, "parameters", ctx)).toBe(inline);
    });

    it("should follow one hop", () => {
        expect(dereference({ $ref: "#/components/parameters/Limit" }, "parameters", ctx)).toBe(limit);
    });

    it("should reject a target that is itself a reference", () => {
        expect(() => dereference({ $ref: "#/components/parameters/Chained" }, "parameters", ctx)).toThrow(
            'Bad reference: "#/components/parameters/Chained"',
        );
    });

    it("should reject missing targets and other namespaces", () => {
        expect(() => dereference({ $ref: "#/components/parameters/Offset" }, "parameters", ctx)).toThrow(
            "Bad reference",
        );
        expect(() => dereference({ $ref: "#/components/responses/Limit" }, "parameters", ctx)).toThrow(
            "Bad reference",
        );
    });

    it("should not find names inherited from Object.prototype", () => {
        expect(() => dereference({ $ref: "#/components/responses/toString" }, "responses", ctx)).toThrow(
            'Bad reference: "#/components/responses/toString"',
        );
        expect(() => dereference({ $ref: "#/components/requestBodies/valueOf" }, "requestBodies", ctx)).toThrow(
            'Bad reference: "#/components/requestBodies/valueOf"',
        );
        expect(() => dereference({ $ref: "#/components/parameters/constructor" }, "parameters", ctx)).toThrow(
            'Bad reference: "#/components/parameters/constructor"',
        );
    });
});
