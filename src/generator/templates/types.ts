/**
 * Common types for template functions
 */
import type { IRModel } from "../../ir/types";
import type { TypeQualifier } from "../naming";

/**
 * One import statement of an emitted file
 */
export interface ImportSpec {
    from: string;
    /** Value imports */
    names?: readonly string[];
    /** Imports written with the `type` modifier */
    typeNames?: readonly string[];
    /** `import type * as <namespace> from ...` */
    namespace?: string;
}

/**
 * Emitter output, kept apart from its imports so that several files can be
 * merged into one unit
 */
export interface EmittedFile {
    imports: ImportSpec[];
    body: string;
}

/**
 * Common context for all templates
 */
export interface TemplateContext {
    model: IRModel;
    /** Spelling of model type references in this file */
    qualify: TypeQualifier;
}

export const MODEL_MODULE = "./model";
export const API_MODULE = "./api";
export const DISPATCHER_MODULE = "./dispatcher";

/** Namespace model types are imported under in separate files */
export const MODELS_NAMESPACE = "Models";
