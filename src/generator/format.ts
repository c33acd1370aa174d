/**
 * Source formatting
 *
 * Formatting only changes whitespace; the emitted text is valid without it.
 */
import { Project } from "ts-morph";

export interface Formatter {
    format(fileName: string, text: string): string;
}

export const identityFormatter: Formatter = {
    format: (_fileName, text) => text,
};

/**
 * Formatter backed by the TypeScript language service formatter, via ts-morph
 */
export function createTsMorphFormatter(indentSize = 4): Formatter {
    const project = new Project({ useInMemoryFileSystem: true });

    return {
        format(fileName, text) {
            const sourceFile = project.createSourceFile(fileName, text, { overwrite: true });
            sourceFile.formatText({
                indentSize,
                tabSize: indentSize,
                convertTabsToSpaces: true,
            });
            const formatted = sourceFile.getFullText();
            project.removeSourceFile(sourceFile);
            return formatted;
        },
    };
}
