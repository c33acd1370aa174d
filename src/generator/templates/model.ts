/**
 * Type definitions template (`model.ts`)
 *
 * One `export interface` per struct and one `export type` per alias, in the
 * order of `components.schemas`. Types in this file refer to each other
 * unqualified.
 */
import type { IRField, TypeDefinition } from "../../ir/types";
import { unwrapOptional } from "../../ir/utils";
import { renderType } from "../naming";
import { docComment } from "./helpers";
import type { EmittedFile, TemplateContext } from "./types";

function renderField(field: IRField): string {
    const doc = docComment(field.description, "    ");
    if (field.required) {
        return `${doc}    ${field.wireName}: ${renderType(field.type)};`;
    }
    return `${doc}    ${field.wireName}?: ${renderType(unwrapOptional(field.type))};`;
}

function renderDefinition({ name, definition }: TypeDefinition): string {
    const doc = docComment(definition.metadata?.description);
    if (definition.kind === "struct") {
        const fields = definition.fields.map(renderField).join("\n");
        return `${doc}export interface ${name.value} {\n${fields}\n}`;
    }
    return `${doc}export type ${name.value} = ${renderType(definition)};`;
}

export function templateModel(ctx: TemplateContext): EmittedFile {
    const definitions = Array.from(ctx.model.types.values()).map(renderDefinition);
    return {
        imports: [],
        body: definitions.length > 0 ? definitions.join("\n\n") : "export {};",
    };
}
