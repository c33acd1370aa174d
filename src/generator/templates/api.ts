/**
 * Service interface template (`api.ts`)
 */
import type { Route, RouteErrorResponse } from "../../ir/types";
import { allRoutes } from "../../ir/utils";
import {
    API_INTERFACE,
    RESULT_TYPE,
    errorUnionName,
    memberName,
    parameterList,
    renderParameters,
    renderType,
    returnType,
    routeTypes,
    type TypeQualifier,
} from "../naming";
import { dedent, modelImport, routeDoc, sections } from "./helpers";
import type { EmittedFile, TemplateContext } from "./types";

export function errorVariant(error: RouteErrorResponse, qualify: TypeQualifier): string {
    const body = error.type ? `body: ${renderType(error.type, qualify)}` : "body?: undefined";
    return `{ status: ${error.status}; kind: "${error.name.value}"; ${body} }`;
}

function errorUnion(route: Route, qualify: TypeQualifier): string {
    const variants = route.errors.map((error) => `    | ${errorVariant(error, qualify)}`).join("\n");
    return `export type ${errorUnionName(route)} =\n${variants};`;
}

function interfaceMethod(route: Route, qualify: TypeQualifier): string {
    const params = renderParameters(parameterList(route), qualify);
    return `${routeDoc(route, "    ")}    ${memberName(route.operationId)}(${params}): Promise<${returnType(route, qualify)}>;`;
}

export function templateApi(ctx: TemplateContext): EmittedFile {
    const routes = allRoutes(ctx.model.routes);

    const resultType = dedent`
        export type ${RESULT_TYPE}<T, E> = { ok: true; value: T } | { ok: false; error: E };
    `;

    const errorUnions = routes
        .filter((route) => route.errors.length > 0)
        .map((route) => errorUnion(route, ctx.qualify))
        .join("\n\n");

    const methods = routes.map((route) => interfaceMethod(route, ctx.qualify)).join("\n");
    const apiInterface = methods ? `export interface ${API_INTERFACE} {\n${methods}\n}` : `export interface ${API_INTERFACE} {}`;

    return {
        imports: modelImport(routes.flatMap(routeTypes)),
        body: sections(resultType, errorUnions, apiInterface),
    };
}
