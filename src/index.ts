export { CodegenError, isCodegenError, type CodegenErrorKind } from "./errors";
export { silentLogger, type Logger } from "./logger";
export {
    Identifier,
    TypeName,
    parseIdentifier,
    parseTypeName,
    splitWords,
    toMixedCase,
    toPascalCase,
    toSnakeCase,
} from "./names";
export { assertOpenApiDocument, type OpenApiDocument } from "./openapi/types";
export {
    createResolveContext,
    dereference,
    parseRef,
    resolveSchemaRef,
    MAX_REFERENCE_DEPTH,
    type ResolveContext,
} from "./resolver";
export { buildType, discardStruct, fromObjectLike, gatherTypes, mergeAllOf } from "./ir/converters/schema-to-ir";
export { analysePath, classifyMethod, errorTypeName, gatherRoutes } from "./ir/converters/paths-to-routes";
export { renderPath } from "./ir/utils";
export type * from "./ir/types";
export {
    ARTIFACTS,
    compile,
    generate,
    type ArtifactName,
    type CompileOptions,
    type GenerateOptions,
    type GeneratedOutput,
} from "./generator";
export { createTsMorphFormatter, identityFormatter, type Formatter } from "./generator/format";
export {
    checkEmittedNames,
    errorUnionName,
    memberName,
    parameterList,
    renderType,
    returnType,
} from "./generator/naming";
