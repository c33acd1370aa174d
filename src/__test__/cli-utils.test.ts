import { copyFile, mkdir, readFile, rm, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { checkDescriptions } from "../cli/check";
import { generateFromDescriptions } from "../cli/generate";
import { DebugLogger, expandSpecPaths, loadDocument, parseDescription } from "../cli/utils";
import { generate } from "../generator";
import { assertOpenApiDocument } from "../openapi/types";
import { loadPetstore, PETSTORE_PATH } from "./util";

const tmpDir = resolve(__dirname, ".tmp-cli-test");

describe("DebugLogger", () => {
    it("should write nothing when disabled", () => {
        const written: string[] = [];
        const logger = new DebugLogger(false, (line) => written.push(line));
        logger.group("Schemas");
        logger.log("Processing schema:", "Pet");
        expect(written).toEqual([]);
    });

    it("should prefix lines and serialize non-strings", () => {
        const written: string[] = [];
        const logger = new DebugLogger(true, (line) => written.push(line));
        logger.group("Routes");
        logger.log("Found paths:", ["/pets", "/pets/{petId}"]);
        logger.log("Single file:", false);
        expect(written).toEqual([
            "\n[DEBUG] === Routes ===",
            '[DEBUG] Found paths: ["/pets","/pets/{petId}"]',
            "[DEBUG] Single file: false",
        ]);
    });
});

describe("parseDescription", () => {
    it("should parse by extension", () => {
        expect(parseDescription("api.json", '{"openapi":"3.0.0"}')).toEqual({ openapi: "3.0.0" });
        expect(parseDescription("api.yaml", "openapi: 3.0.0\n")).toEqual({ openapi: "3.0.0" });
        expect(parseDescription("api.yml", "info:\n  title: Test\n")).toEqual({ info: { title: "Test" } });
    });

    it("should reject other extensions", () => {
        expect(() => parseDescription("api.txt", "")).toThrow("Unsupported file format. Use .json or .yaml/.yml files.");
    });
});

describe("assertOpenApiDocument", () => {
    it("should accept a 3.0 document", () => {
        expect(() => assertOpenApiDocument({ openapi: "3.0.1", info: {}, paths: {} })).not.toThrow();
    });

    it("should reject anything else", () => {
        expect(() => assertOpenApiDocument([])).toThrow("OpenAPI document must be an object");
        expect(() => assertOpenApiDocument({ swagger: "2.0" })).toThrow(
            "Unsupported OpenAPI version: undefined. Only 3.0.x is supported",
        );
        expect(() => assertOpenApiDocument({ openapi: "3.1.0" })).toThrow("Unsupported OpenAPI version: 3.1.0");
        expect(() => assertOpenApiDocument({ openapi: "3.0.0", paths: {} })).toThrow("OpenAPI document is missing 'info'");
        expect(() => assertOpenApiDocument({ openapi: "3.0.0", info: {} })).toThrow("OpenAPI document is missing 'paths'");
        expect(() => assertOpenApiDocument({ openapi: "3.0.0", info: {}, paths: {}, components: 1 })).toThrow(
            "OpenAPI 'components' must be an object",
        );
    });
});

describe("loadDocument", () => {
    it("should load a YAML description", async () => {
        const document = await loadDocument(PETSTORE_PATH);
        expect(document.info.title).toBe("Pet Store");
        expect(Object.keys(document.paths)).toEqual(["/pets", "/pets/{petId}"]);
    });
});

describe("commands", () => {
    beforeEach(async () => {
        await mkdir(tmpDir, { recursive: true });
        vi.spyOn(console, "log").mockImplementation(() => undefined);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(tmpDir, { recursive: true, force: true });
    });

    describe("expandSpecPaths", () => {
        it("should find descriptions in a directory", async () => {
            expect(await expandSpecPaths([dirname(PETSTORE_PATH)])).toEqual([PETSTORE_PATH]);
        });

        it("should expand glob patterns and skip other files", async () => {
            await writeFile(resolve(tmpDir, "b.json"), "{}");
            await writeFile(resolve(tmpDir, "a.yml"), "");
            await writeFile(resolve(tmpDir, "notes.txt"), "");
            expect(await expandSpecPaths([`${tmpDir}/*`])).toEqual([resolve(tmpDir, "a.yml"), resolve(tmpDir, "b.json")]);
        });

        it("should return nothing for paths that match nothing", async () => {
            expect(await expandSpecPaths([resolve(tmpDir, "missing.yaml")])).toEqual([]);
        });
    });

    describe("generateFromDescriptions", () => {
        it("should write the five artifacts", async () => {
            const outdir = resolve(tmpDir, "out");
            await generateFromDescriptions([PETSTORE_PATH], { outdir, format: false });

            const { files } = generate(loadPetstore());
            expect(await readFile(resolve(outdir, "model.ts"), "utf8")).toBe(files["model.ts"]);
            expect(await readFile(resolve(outdir, "client.ts"), "utf8")).toBe(files["client.ts"]);
            expect(console.log).toHaveBeenCalledWith(`✓ Generated ${resolve(outdir, "api.ts")}`);
        });

        it("should write a single unit", async () => {
            const outdir = resolve(tmpDir, "single");
            await generateFromDescriptions([PETSTORE_PATH], { outdir, format: false, singleFile: true });
            expect(await readFile(resolve(outdir, "index.ts"), "utf8")).toBe(generate(loadPetstore()).unit);
        });

        it("should give each description its own directory", async () => {
            await copyFile(PETSTORE_PATH, resolve(tmpDir, "first.yaml"));
            await copyFile(PETSTORE_PATH, resolve(tmpDir, "second.yaml"));
            const outdir = resolve(tmpDir, "many");

            await generateFromDescriptions([`${tmpDir}/*.yaml`], { outdir, format: false });
            expect(await readFile(resolve(outdir, "second", "api.ts"), "utf8")).toBe(generate(loadPetstore()).files["api.ts"]);
        });

        it("should require --outdir for more than one description", async () => {
            await copyFile(PETSTORE_PATH, resolve(tmpDir, "first.yaml"));
            await copyFile(PETSTORE_PATH, resolve(tmpDir, "second.yaml"));
            await expect(generateFromDescriptions([tmpDir])).rejects.toThrow(
                "--outdir is required when generating from more than one description",
            );
        });

        it("should fail when nothing matches", async () => {
            await expect(generateFromDescriptions([resolve(tmpDir, "*.json")])).rejects.toThrow(
                "No OpenAPI descriptions found (.json, .yaml, .yml)",
            );
        });
    });

    describe("checkDescriptions", () => {
        it("should print a summary per description", async () => {
            await checkDescriptions([PETSTORE_PATH]);
            expect(console.log).toHaveBeenCalledWith(`✓ ${PETSTORE_PATH}: 4 type(s), 4 operation(s)`);
        });

        it("should stop on the first invalid description", async () => {
            const broken = resolve(tmpDir, "broken.json");
            await writeFile(
                broken,
                JSON.stringify({
                    openapi: "3.0.0",
                    info: { title: "Broken", version: "1" },
                    paths: { "/pets": { get: { responses: { "200": { description: "OK" } } } } },
                }),
            );
            await expect(checkDescriptions([broken])).rejects.toThrow("No operation id given for route GET /pets");
        });
    });
});
