import { compile } from "../generator";
import { allRoutes } from "../ir/utils";
import { DebugLogger, expandSpecPaths, loadDocument } from "./utils";

export interface CheckCommandOptions {
    debug?: boolean;
}

/**
 * Compile every description without emitting anything and print a summary.
 * The first description that fails stops the run.
 */
export async function checkDescriptions(paths: string[], options: CheckCommandOptions = {}): Promise<void> {
    const debug = new DebugLogger(options.debug ?? false);

    debug.group("Command Arguments");
    debug.log("Command: check");
    debug.log("Inputs:", paths);

    const files = await expandSpecPaths(paths);
    if (files.length === 0) {
        throw new Error("No OpenAPI descriptions found (.json, .yaml, .yml)");
    }

    for (const file of files) {
        debug.group(`Description ${file}`);
        const model = compile(await loadDocument(file), { logger: debug });
        const operations = allRoutes(model.routes).length;
        console.log(`✓ ${file}: ${model.types.size} type(s), ${operations} operation(s)`);
    }
}
