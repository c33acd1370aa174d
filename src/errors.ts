/**
 * Generation-time errors
 *
 * Every failure in the compilation pipeline is a `CodegenError`. Nothing is
 * retried and nothing is emitted once one is thrown.
 */

export type CodegenErrorKind =
    | "BadReference"
    | "UnexpectedReference"
    | "UnsupportedKind"
    | "EmptyStruct"
    | "NotStructurallyTyped"
    | "UnsupportedMerge"
    | "MalformedPath"
    | "NoOperationId"
    | "BadIdentifier"
    | "BadTypeName"
    | "DuplicateName"
    | "BadStatusCode"
    | "MultipleSuccessCodes"
    | "MissingSuccessCode"
    | "UnsupportedContentType"
    | "MissingSchema"
    | "UnexpectedBody"
    | "UnsupportedParameter"
    | "PathParameterMismatch"
    | "UnsupportedResponse";

const MESSAGES: Record<CodegenErrorKind, (subject: string) => string> = {
    BadReference: (s) => `Bad reference: "${s}"`,
    UnexpectedReference: (s) => `Unexpected reference: "${s}"`,
    UnsupportedKind: (s) => `Schema not supported: ${s}`,
    EmptyStruct: (s) => `Empty struct: ${s}`,
    NotStructurallyTyped: (s) => `Inline object schemas must be named: ${s}`,
    UnsupportedMerge: (s) => `Structural merge not supported: ${s}`,
    MalformedPath: (s) => `Path is malformed: ${s}`,
    NoOperationId: (s) => `No operation id given for route ${s}`,
    BadIdentifier: (s) => `${s} is not a valid identifier`,
    BadTypeName: (s) => `${s} is not a valid type name`,
    DuplicateName: (s) => `Duplicate name: ${s}`,
    BadStatusCode: (s) => `Unsupported status code: ${s}. Only 2XX and 4XX status codes are allowed`,
    MultipleSuccessCodes: (s) => `Expected exactly one 'success' status, found ${s}`,
    MissingSuccessCode: (s) => `Expected exactly one 'success' status for ${s}`,
    UnsupportedContentType: (s) => `Content type must be 'application/json': ${s}`,
    MissingSchema: (s) => `Media type does not contain schema: ${s}`,
    UnexpectedBody: (s) => `Request body not allowed: ${s}`,
    UnsupportedParameter: (s) => `Parameter not supported: ${s}`,
    PathParameterMismatch: (s) => `Path parameters do not match path template: ${s}`,
    UnsupportedResponse: (s) => `Response not supported: ${s}`,
};

export class CodegenError extends Error {
    readonly kind: CodegenErrorKind;
    /** The offending reference, path, identifier or status, verbatim */
    readonly subject: string;

    constructor(kind: CodegenErrorKind, subject: string, options?: { cause?: unknown }) {
        super(MESSAGES[kind](subject), options);
        this.name = "CodegenError";
        this.kind = kind;
        this.subject = subject;
    }
}

export function isCodegenError(error: unknown, kind?: CodegenErrorKind): error is CodegenError {
    return error instanceof CodegenError && (kind === undefined || error.kind === kind);
}
