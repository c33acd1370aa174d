/**
 * Validated names
 *
 * `Identifier` (snake_case canonical, used for fields, parameters and operations)
 * and `TypeName` (PascalCase, used for named component types) can only be built
 * through `parseIdentifier` / `parseTypeName`.
 */
import { CodegenError } from "../errors";

/**
 * Split a string into words.
 *
 * Non-alphanumeric characters separate words. Inside a run of alphanumerics a new
 * word starts on a lower→upper transition (`petId` → `pet`, `Id`) and at the last
 * capital of an upper-case run followed by a lower-case letter (`HTTPServer` →
 * `HTTP`, `Server`). Digits stay with the word before them.
 */
export function splitWords(input: string): string[] {
    const words: string[] = [];

    for (const chunk of input.split(/[^A-Za-z0-9]+/)) {
        if (!chunk) continue;

        let current = "";
        for (let i = 0; i < chunk.length; i++) {
            const ch = chunk.charAt(i);
            const prev = chunk.charAt(i - 1);
            const next = chunk.charAt(i + 1);

            if (current && isUpper(ch)) {
                const afterLower = isLower(prev) || isDigit(prev);
                const endsAcronym = isUpper(prev) && isLower(next);
                if (afterLower || endsAcronym) {
                    words.push(current);
                    current = "";
                }
            }
            current += ch;
        }
        if (current) words.push(current);
    }

    return words;
}

function isUpper(ch: string): boolean {
    return ch >= "A" && ch <= "Z";
}

function isLower(ch: string): boolean {
    return ch >= "a" && ch <= "z";
}

function isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function toSnakeCase(input: string): string {
    return splitWords(input)
        .map((w) => w.toLowerCase())
        .join("_");
}

export function toMixedCase(input: string): string {
    return splitWords(input)
        .map((w, i) => (i === 0 ? w.toLowerCase() : capitalize(w)))
        .join("");
}

export function toPascalCase(input: string): string {
    return splitWords(input).map(capitalize).join("");
}

const STARTS_WITH_LETTER = /^[A-Za-z]/;

/**
 * A field, parameter or operation name, stored in snake_case.
 */
export class Identifier {
    private readonly nominal = "identifier" as const;

    private constructor(
        /** snake_case canonical form */
        readonly value: string,
        /** The text this identifier was parsed from */
        readonly source: string,
    ) {}

    /**
     * Accepts names already in snake_case or mixedCase (common in JS-flavoured
     * descriptions) and normalizes them to snake_case.
     */
    static parse(raw: string): Identifier {
        if (!STARTS_WITH_LETTER.test(raw)) {
            throw new CodegenError("BadIdentifier", raw);
        }
        const snake = toSnakeCase(raw);
        if (raw !== snake && raw !== toMixedCase(raw)) {
            throw new CodegenError("BadIdentifier", raw);
        }
        return new Identifier(snake, raw);
    }

    equals(other: Identifier): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

/**
 * A component type name in PascalCase.
 */
export class TypeName {
    private readonly nominal = "type-name" as const;

    private constructor(readonly value: string) {}

    static parse(raw: string): TypeName {
        if (!STARTS_WITH_LETTER.test(raw) || raw !== toPascalCase(raw)) {
            throw new CodegenError("BadTypeName", raw);
        }
        return new TypeName(raw);
    }

    equals(other: TypeName): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}

export function parseIdentifier(raw: string): Identifier {
    return Identifier.parse(raw);
}

export function parseTypeName(raw: string): TypeName {
    return TypeName.parse(raw);
}
