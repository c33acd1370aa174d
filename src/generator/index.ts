/**
 * Compilation pipeline entry
 *
 * `compile` builds the IR (type pass, then route pass) and checks the names the
 * emitters will produce. `generate` runs every template over that IR.
 *
 * @example
 * ```typescript
 * import { generate } from "routewright";
 *
 * const { files } = generate(document, { formatter: createTsMorphFormatter() });
 * console.log(files["api.ts"]);
 * ```
 */
import type { IRModel } from "../ir/types";
import { gatherTypes } from "../ir/converters/schema-to-ir";
import { gatherRoutes } from "../ir/converters/paths-to-routes";
import { silentLogger, type Logger } from "../logger";
import type { OpenApiDocument } from "../openapi/types";
import { createResolveContext } from "../resolver";
import { renderFile, renderUnit } from "./files";
import { identityFormatter, type Formatter } from "./format";
import { MODELS_NAMESPACE, type EmittedFile, type TemplateContext } from "./templates/types";
import { checkEmittedNames, unqualified, type TypeQualifier } from "./naming";
import { templateApi } from "./templates/api";
import { templateClient } from "./templates/client";
import { templateDispatcher } from "./templates/dispatcher";
import { templateModel } from "./templates/model";
import { templateServer } from "./templates/server";

export const ARTIFACTS = ["model.ts", "api.ts", "dispatcher.ts", "server.ts", "client.ts"] as const;
export type ArtifactName = (typeof ARTIFACTS)[number];

/** File name the concatenated unit is formatted under */
export const UNIT_FILE = "index.ts";

export interface CompileOptions {
    logger?: Logger;
}

export interface GenerateOptions extends CompileOptions {
    /** Applied to every emitted file; no formatting by default */
    formatter?: Formatter;
    /** Default base URL of the generated client, instead of `servers[0].url` */
    baseUrl?: string;
}

export interface GeneratedOutput {
    files: Record<ArtifactName, string>;
    /** All artifacts concatenated into one module */
    unit: string;
    model: IRModel;
}

/**
 * Build the IR of a document. Throws `CodegenError` on the first problem.
 */
export function compile(document: OpenApiDocument, options: CompileOptions = {}): IRModel {
    const logger = options.logger ?? silentLogger;
    const ctx = createResolveContext(document, logger);

    logger.group?.("Schemas");
    const types = gatherTypes(ctx);
    logger.group?.("Routes");
    const routes = gatherRoutes(document, ctx, types);

    const model: IRModel = { types, routes };
    const serverUrl = document.servers?.[0]?.url;
    if (serverUrl) model.baseUrl = serverUrl;

    checkEmittedNames(model);
    return model;
}

const qualified: TypeQualifier = (name) => `${MODELS_NAMESPACE}.${name}`;

function emitAll(model: IRModel, qualify: TypeQualifier, options: GenerateOptions): Record<ArtifactName, EmittedFile> {
    const ctx: TemplateContext = { model, qualify };
    return {
        "model.ts": templateModel(ctx),
        "api.ts": templateApi(ctx),
        "dispatcher.ts": templateDispatcher(ctx),
        "server.ts": templateServer(ctx),
        "client.ts": templateClient(ctx, { baseUrl: options.baseUrl }),
    };
}

/**
 * Compile a document and emit the five artifacts, separately and as one unit.
 */
export function generate(document: OpenApiDocument, options: GenerateOptions = {}): GeneratedOutput {
    const formatter = options.formatter ?? identityFormatter;
    const model = compile(document, options);

    const separate = emitAll(model, qualified, options);
    const files = {
        "model.ts": formatter.format("model.ts", renderFile(separate["model.ts"])),
        "api.ts": formatter.format("api.ts", renderFile(separate["api.ts"])),
        "dispatcher.ts": formatter.format("dispatcher.ts", renderFile(separate["dispatcher.ts"])),
        "server.ts": formatter.format("server.ts", renderFile(separate["server.ts"])),
        "client.ts": formatter.format("client.ts", renderFile(separate["client.ts"])),
    } satisfies Record<ArtifactName, string>;

    const merged = emitAll(model, unqualified, options);
    const unit = formatter.format(UNIT_FILE, renderUnit(ARTIFACTS.map((name) => merged[name])));

    return { files, unit, model };
}
