import { mkdir, writeFile } from "fs/promises";
import { basename, extname, resolve } from "path";

import { createTsMorphFormatter, identityFormatter } from "../generator/format";
import { ARTIFACTS, generate, type GeneratedOutput } from "../generator";
import { DebugLogger, expandSpecPaths, loadDocument } from "./utils";

export interface GenerateCommandOptions {
    outdir?: string;
    singleFile?: boolean;
    format?: boolean;
    baseUrl?: string;
    debug?: boolean;
}

/**
 * Generate the service contract for every description matched by `paths`
 */
export async function generateFromDescriptions(paths: string[], options: GenerateCommandOptions = {}): Promise<void> {
    const debug = new DebugLogger(options.debug ?? false);

    debug.group("Command Arguments");
    debug.log("Command: generate");
    debug.log("Inputs:", paths);
    debug.log("Output directory:", options.outdir ?? "stdout");
    debug.log("Single file:", options.singleFile ?? false);
    debug.log("Format:", options.format ?? true);
    debug.log("Base URL:", options.baseUrl ?? "from servers");

    const files = await expandSpecPaths(paths);
    if (files.length === 0) {
        throw new Error("No OpenAPI descriptions found (.json, .yaml, .yml)");
    }
    if (files.length > 1 && options.outdir === undefined) {
        throw new Error("--outdir is required when generating from more than one description");
    }

    const formatter = options.format === false ? identityFormatter : createTsMorphFormatter();

    for (const file of files) {
        debug.group(`Description ${file}`);
        const document = await loadDocument(file);
        debug.log("OpenAPI version:", document.openapi);
        debug.log("Title:", document.info.title);

        const output = generate(document, { formatter, baseUrl: options.baseUrl, logger: debug });
        debug.log(`Generated ${output.model.types.size} type(s) and ${output.model.routes.size} path(s)`);

        if (options.outdir === undefined) {
            process.stdout.write(output.unit);
            continue;
        }

        const outdir = files.length > 1 ? resolve(options.outdir, basename(file, extname(file))) : options.outdir;
        await writeOutput(output, outdir, options.singleFile ?? false);
    }
}

/**
 * Write the artifacts (or the single unit) to `outdir`
 */
async function writeOutput(output: GeneratedOutput, outdir: string, singleFile: boolean): Promise<void> {
    await mkdir(outdir, { recursive: true });

    if (singleFile) {
        const filename = resolve(outdir, "index.ts");
        await writeFile(filename, output.unit);
        console.log(`✓ Generated ${filename}`);
        return;
    }

    for (const name of ARTIFACTS) {
        const filename = resolve(outdir, name);
        await writeFile(filename, output.files[name]);
        console.log(`✓ Generated ${filename}`);
    }

    console.log(`\nGenerated ${ARTIFACTS.length} file(s) in ${outdir}`);
}
