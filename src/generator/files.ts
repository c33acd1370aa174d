/**
 * Rendering of emitted files, one by one or merged into a single unit
 */
import type { EmittedFile, ImportSpec } from "./templates/types";

function isLocal(spec: ImportSpec): boolean {
    return spec.from.startsWith("./");
}

export function renderImport(spec: ImportSpec): string[] {
    const lines: string[] = [];
    if (spec.namespace) {
        lines.push(`import type * as ${spec.namespace} from "${spec.from}";`);
    }

    const names = spec.names ?? [];
    const typeNames = (spec.typeNames ?? []).filter((name) => !names.includes(name));
    if (names.length > 0) {
        const specifiers = [...names, ...typeNames.map((name) => `type ${name}`)];
        lines.push(`import { ${specifiers.join(", ")} } from "${spec.from}";`);
    } else if (typeNames.length > 0) {
        lines.push(`import type { ${typeNames.join(", ")} } from "${spec.from}";`);
    }
    return lines;
}

export function renderFile(file: EmittedFile): string {
    const imports = file.imports.flatMap(renderImport);
    return imports.length > 0 ? `${imports.join("\n")}\n\n${file.body}\n` : `${file.body}\n`;
}

/**
 * Merge imports from the same module; namespace imports are kept apart.
 */
export function mergeImports(specs: ImportSpec[]): ImportSpec[] {
    const merged = new Map<string, { names: Set<string>; typeNames: Set<string> }>();
    const namespaces: ImportSpec[] = [];

    for (const spec of specs) {
        if (spec.namespace) {
            namespaces.push({ from: spec.from, namespace: spec.namespace });
        }
        if (!spec.names?.length && !spec.typeNames?.length) continue;

        const entry = merged.get(spec.from) ?? { names: new Set<string>(), typeNames: new Set<string>() };
        merged.set(spec.from, entry);
        spec.names?.forEach((name) => entry.names.add(name));
        spec.typeNames?.forEach((name) => entry.typeNames.add(name));
    }

    return [
        ...namespaces,
        ...Array.from(merged, ([from, { names, typeNames }]) => ({
            from,
            names: Array.from(names).sort(),
            typeNames: Array.from(typeNames).sort(),
        })),
    ];
}

/**
 * Concatenate files into one module. Imports between the files themselves are
 * dropped, the rest are merged.
 */
export function renderUnit(files: EmittedFile[]): string {
    const imports = mergeImports(files.flatMap((file) => file.imports.filter((spec) => !isLocal(spec))));
    return renderFile({ imports, body: files.map((file) => file.body).join("\n\n") });
}
