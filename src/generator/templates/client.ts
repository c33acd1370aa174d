/**
 * Fetch client template (`client.ts`)
 *
 * Generates an `ApiClient` class implementing `Api` over the fetch API. Every
 * method builds the URL from its path and query parameters, sends the JSON
 * body, and maps the response status back onto the success value or the
 * matching error variant. TRACE operations get a method too, but fetch never
 * sends TRACE, so calling it always rejects.
 */
import type { Route, RouteErrorResponse } from "../../ir/types";
import { allRoutes } from "../../ir/utils";
import {
    API_INTERFACE,
    CLIENT_CLASS,
    CLIENT_OPTIONS,
    RESULT_TYPE,
    UNEXPECTED_STATUS_ERROR,
    errorUnionName,
    memberName,
    parameterList,
    renderParameters,
    renderType,
    returnType,
    routeTypes,
    type TypeQualifier,
} from "../naming";
import { dedent, docComment, indent, modelImport, routeDoc, sections } from "./helpers";
import { DEFAULT_HOST, DEFAULT_PORT } from "./server";
import { API_MODULE, type EmittedFile, type TemplateContext } from "./types";

export const DEFAULT_BASE_URL = `http://${DEFAULT_HOST}:${DEFAULT_PORT}`;

/**
 * Base URL the client falls back to: the first server URL when it is absolute,
 * the default origin plus the server URL when it is a path, the default origin
 * otherwise.
 */
export function defaultBaseUrl(serverUrl: string | undefined): string {
    if (!serverUrl) return DEFAULT_BASE_URL;
    if (/^https?:\/\//.test(serverUrl)) return serverUrl.replace(/\/+$/, "");
    if (serverUrl.startsWith("/")) return DEFAULT_BASE_URL + serverUrl.replace(/\/+$/, "");
    return DEFAULT_BASE_URL;
}

/**
 * Expression for the request path of a route: a string literal when it has no
 * parameters, a template literal with encoded parameters otherwise
 */
export function pathExpression(route: Route): string {
    if (route.pathParams.length === 0) {
        const literal = route.segments.map((s) => (s.kind === "literal" ? `/${s.value}` : "")).join("");
        return JSON.stringify(literal || "/");
    }

    const parts = route.segments.map((segment) => {
        if (segment.kind === "literal") return `/${segment.value}`;
        const param = route.pathParams.find((p) => p.name.equals(segment.identifier));
        const name = param ? memberName(param.name) : segment.name;
        if (param?.codec.kind === "list") {
            return `/\${${name}.map((item) => encodeURIComponent(String(item))).join(",")}`;
        }
        return `/\${encodeURIComponent(String(${name}))}`;
    });
    return `\`${parts.join("")}\``;
}

function queryExpression(route: Route): string {
    if (route.queryParams.length === 0) return "{}";
    const entries = route.queryParams.map((param) => {
        const name = memberName(param.name);
        return name === param.wireName ? name : `${JSON.stringify(param.wireName)}: ${name}`;
    });
    return `{ ${entries.join(", ")} }`;
}

function errorCase(error: RouteErrorResponse, qualify: TypeQualifier): string {
    const body = error.type ? `, body: httpResponse.body as ${renderType(error.type, qualify)}` : "";
    return [
        `case ${error.status}:`,
        `    return { ok: false, error: { status: ${error.status}, kind: "${error.name.value}"${body} } };`,
    ].join("\n");
}

function methodBody(route: Route, qualify: TypeQualifier): string {
    const params = parameterList(route);
    const body = params.find((p) => p.source === "body");
    const sendArgs = [JSON.stringify(route.method.verb), pathExpression(route), queryExpression(route)];
    if (body) sendArgs.push(body.name);

    const lines = [`const httpResponse = await this.send(${sendArgs.join(", ")});`];
    const success = route.success;
    const value = success.type ? `httpResponse.body as ${renderType(success.type, qualify)}` : undefined;

    if (route.errors.length === 0) {
        lines.push(
            `if (httpResponse.status !== ${success.status}) {`,
            `    throw new ${UNEXPECTED_STATUS_ERROR}(httpResponse.status, httpResponse.body);`,
            "}",
        );
        if (value) lines.push(`return ${value};`);
        return lines.join("\n");
    }

    lines.push(
        "switch (httpResponse.status) {",
        `    case ${success.status}:`,
        `        return { ok: true, value: ${value ?? "undefined"} };`,
        ...route.errors.map((error) => indent(errorCase(error, qualify), "    ")),
        "    default:",
        `        throw new ${UNEXPECTED_STATUS_ERROR}(httpResponse.status, httpResponse.body);`,
        "}",
    );
    return lines.join("\n");
}

export const TRACE_NOTE = "fetch refuses TRACE requests, so this method always rejects.";

/**
 * Route JSDoc; TRACE methods are kept so the class implements `Api`, but say
 * that they cannot be sent.
 */
function methodDoc(route: Route): string {
    if (route.method.verb !== "TRACE") return routeDoc(route, "    ");
    const text = [route.description, TRACE_NOTE].filter(Boolean).join("\n\n");
    return docComment(text, "    ", route.deprecated ? ["@deprecated"] : []);
}

function clientMethod(route: Route, qualify: TypeQualifier): string {
    const signature = `async ${memberName(route.operationId)}(${renderParameters(parameterList(route), qualify)}): Promise<${returnType(route, qualify)}> {`;
    return `${methodDoc(route)}    ${signature}\n${indent(methodBody(route, qualify), "        ")}\n    }`;
}

export interface ClientTemplateOptions {
    /** Overrides the base URL derived from `servers` */
    baseUrl?: string;
}

export function templateClient(ctx: TemplateContext, options: ClientTemplateOptions = {}): EmittedFile {
    const routes = allRoutes(ctx.model.routes);
    const baseUrl = options.baseUrl ?? defaultBaseUrl(ctx.model.baseUrl);

    const preamble = dedent`
        export class ${UNEXPECTED_STATUS_ERROR} extends Error {
            constructor(
                readonly status: number,
                readonly body: unknown,
            ) {
                super(\`Unexpected response status \${status}\`);
                this.name = "${UNEXPECTED_STATUS_ERROR}";
            }
        }

        export interface ${CLIENT_OPTIONS} {
            /** Defaults to ${JSON.stringify(baseUrl)} */
            baseUrl?: string;
            fetch?: typeof fetch;
            /** Sent with every request */
            headers?: Record<string, string>;
        }
    `;

    const members = dedent`
        private readonly baseUrl: string;
        private readonly fetchFn: typeof fetch;
        private readonly headers: Record<string, string>;

        constructor(options: ${CLIENT_OPTIONS} = {}) {
            this.baseUrl = (options.baseUrl ?? ${JSON.stringify(baseUrl)}).replace(/\\/+$/, "");
            this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
            this.headers = options.headers ?? {};
        }

        private async send(
            method: string,
            path: string,
            query: Record<string, string | number | boolean | (string | number | boolean)[] | undefined>,
            body?: unknown,
        ): Promise<{ status: number; body: unknown }> {
            const url = new URL(this.baseUrl + path);
            for (const [key, value] of Object.entries(query)) {
                if (value === undefined) continue;
                for (const item of Array.isArray(value) ? value : [value]) {
                    url.searchParams.append(key, String(item));
                }
            }

            const headers: Record<string, string> = { ...this.headers };
            if (body !== undefined) headers["Content-Type"] = "application/json";

            const response = await this.fetchFn(url, {
                method,
                headers,
                body: body === undefined ? undefined : JSON.stringify(body),
            });
            const text = await response.text();
            return { status: response.status, body: text ? JSON.parse(text) : undefined };
        }
    `;

    const methods = routes.map((route) => clientMethod(route, ctx.qualify));
    const classBody = [indent(members, "    "), ...methods].join("\n\n");
    const client = `export class ${CLIENT_CLASS} implements ${API_INTERFACE} {\n${classBody}\n}`;

    const unions = routes.filter((route) => route.errors.length > 0).map(errorUnionName);
    const apiTypes = [API_INTERFACE, ...(unions.length > 0 ? [RESULT_TYPE] : []), ...unions];

    return {
        imports: [...modelImport(routes.flatMap(routeTypes)), { from: API_MODULE, typeNames: apiTypes }],
        body: sections(preamble, client),
    };
}
