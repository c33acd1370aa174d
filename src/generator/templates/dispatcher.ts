/**
 * Dispatcher template (`dispatcher.ts`)
 *
 * Emits one dispatcher per operation, keyed by the operation's member name, that
 * decodes path and query strings according to the parameter's `ParamCodec`,
 * calls the matching `Api` method and turns its result into a status and body.
 * The routing table maps each path template to its `{ method, operation }`
 * bindings in declaration order.
 */
import type { IRPrimitiveType, Route, RouteParam } from "../../ir/types";
import { allRoutes, renderPath } from "../../ir/utils";
import {
    API_INTERFACE,
    BAD_REQUEST_ERROR,
    DISPATCH_HANDLER,
    DISPATCH_REQUEST,
    DISPATCH_RESPONSE,
    OPERATION_NAME,
    ROUTE_BINDING,
    bodyParamName,
    memberName,
    parameterList,
    renderType,
    type TypeQualifier,
} from "../naming";
import { dedent, modelImport, sections } from "./helpers";
import { API_MODULE, type EmittedFile, type TemplateContext } from "./types";

const DECODERS: Record<IRPrimitiveType, string> = {
    string: "decodeString",
    number: "decodeNumber",
    integer: "decodeInteger",
    boolean: "decodeBoolean",
};

const RUNTIME = dedent`
    export interface ${DISPATCH_REQUEST} {
        /** Path parameters by placeholder name */
        params: Record<string, string | undefined>;
        /** Query string values; repeated keys are arrays */
        query: Record<string, string | string[] | undefined>;
        /** Parsed JSON body */
        body?: unknown;
    }

    export interface ${DISPATCH_RESPONSE} {
        status: number;
        body?: unknown;
    }

    export type ${DISPATCH_HANDLER} = (api: ${API_INTERFACE}, req: ${DISPATCH_REQUEST}) => Promise<${DISPATCH_RESPONSE}>;

    export class ${BAD_REQUEST_ERROR} extends Error {
        constructor(message: string) {
            super(message);
            this.name = "${BAD_REQUEST_ERROR}";
        }
    }

    export function decodeString(_name: string, raw: string): string {
        return raw;
    }

    export function decodeNumber(name: string, raw: string): number {
        const value = Number(raw);
        if (raw.trim() === "" || Number.isNaN(value)) {
            throw new ${BAD_REQUEST_ERROR}(\`\${name}: expected a number, got "\${raw}"\`);
        }
        return value;
    }

    export function decodeInteger(name: string, raw: string): number {
        const value = decodeNumber(name, raw);
        if (!Number.isInteger(value)) {
            throw new ${BAD_REQUEST_ERROR}(\`\${name}: expected an integer, got "\${raw}"\`);
        }
        return value;
    }

    export function decodeBoolean(name: string, raw: string): boolean {
        if (raw === "true") return true;
        if (raw === "false") return false;
        throw new ${BAD_REQUEST_ERROR}(\`\${name}: expected true or false, got "\${raw}"\`);
    }

    function single(value: string | string[] | undefined): string | undefined {
        return Array.isArray(value) ? value[value.length - 1] : value;
    }

    function list(value: string | string[] | undefined): string[] | undefined {
        if (value === undefined) return undefined;
        return Array.isArray(value) ? value : [value];
    }

    function required<T>(name: string, value: T | undefined): T {
        if (value === undefined) {
            throw new ${BAD_REQUEST_ERROR}(\`missing parameter \${name}\`);
        }
        return value;
    }

    function optional<R, T>(value: R | undefined, decode: (value: R) => T): T | undefined {
        return value === undefined ? undefined : decode(value);
    }
`;

/**
 * Expression decoding one path or query parameter from `req`
 */
export function decodeExpression(param: RouteParam, source: "path" | "query"): string {
    const wire = JSON.stringify(param.wireName);
    const decoder = DECODERS[param.codec.primitive];

    if (source === "path") {
        const raw = `required(${wire}, req.params[${wire}])`;
        return param.codec.kind === "scalar"
            ? `${decoder}(${wire}, ${raw})`
            : `${raw}.split(",").map((item) => ${decoder}(${wire}, item))`;
    }

    if (param.codec.kind === "scalar") {
        const raw = `single(req.query[${wire}])`;
        return param.required
            ? `${decoder}(${wire}, required(${wire}, ${raw}))`
            : `optional(${raw}, (value) => ${decoder}(${wire}, value))`;
    }

    const raw = `list(req.query[${wire}])`;
    const decodeAll = `.map((item) => ${decoder}(${wire}, item))`;
    return param.required
        ? `required(${wire}, ${raw})${decodeAll}`
        : `optional(${raw}, (value) => value${decodeAll})`;
}

function dispatcherEntry(route: Route, qualify: TypeQualifier): string {
    const member = memberName(route.operationId);
    const lines: string[] = [];

    for (const param of route.pathParams) {
        lines.push(`const ${memberName(param.name)} = ${decodeExpression(param, "path")};`);
    }
    for (const param of route.queryParams) {
        lines.push(`const ${memberName(param.name)} = ${decodeExpression(param, "query")};`);
    }
    const bodyName = bodyParamName(route);
    if (route.body && bodyName) {
        lines.push(`const ${bodyName} = req.body as ${renderType(route.body.type, qualify)};`);
    }

    const params = parameterList(route);
    const args = params.map((p) => p.name).join(", ");
    const status = route.success.status;
    const successBody = route.success.type ? "result" : undefined;

    if (route.errors.length > 0) {
        lines.push(`const result = await api.${member}(${args});`);
        lines.push("if (!result.ok) {");
        lines.push("    return { status: result.error.status, body: result.error.body };");
        lines.push("}");
        lines.push(successBody ? `return { status: ${status}, body: result.value };` : `return { status: ${status} };`);
    } else if (successBody) {
        lines.push(`const result = await api.${member}(${args});`);
        lines.push(`return { status: ${status}, body: result };`);
    } else {
        lines.push(`await api.${member}(${args});`);
        lines.push(`return { status: ${status} };`);
    }

    const body = lines.map((line) => `        ${line}`).join("\n");
    return `    async ${member}(api: ${API_INTERFACE}, req: ${DISPATCH_REQUEST}): Promise<${DISPATCH_RESPONSE}> {\n${body}\n    },`;
}

function routingTable(ctx: TemplateContext): string {
    const entries = Array.from(ctx.model.routes.values()).flatMap((routes) => {
        const [first] = routes;
        if (!first) return [];
        const bindings = routes
            .map((route) => `        { method: "${route.method.verb}", operation: "${memberName(route.operationId)}" },`)
            .join("\n");
        return [`    ${JSON.stringify(renderPath(first.segments))}: [\n${bindings}\n    ],`];
    });

    const table = entries.length > 0 ? `{\n${entries.join("\n")}\n}` : "{}";
    return `export const routes: Record<string, readonly ${ROUTE_BINDING}[]> = ${table};`;
}

export function templateDispatcher(ctx: TemplateContext): EmittedFile {
    const routes = allRoutes(ctx.model.routes);
    const entries = routes.map((route) => dispatcherEntry(route, ctx.qualify)).join("\n\n");
    const bodyTypes = routes.flatMap((route) => (route.body ? [route.body.type] : []));

    const dispatchers = entries
        ? `export const dispatchers = {\n${entries}\n} satisfies Record<string, ${DISPATCH_HANDLER}>;`
        : `export const dispatchers = {} satisfies Record<string, ${DISPATCH_HANDLER}>;`;

    const dispatch = dedent`
        export type ${OPERATION_NAME} = keyof typeof dispatchers;

        const handlers: Record<${OPERATION_NAME}, ${DISPATCH_HANDLER}> = dispatchers;

        export interface ${ROUTE_BINDING} {
            method: "GET" | "HEAD" | "OPTIONS" | "TRACE" | "POST" | "PUT" | "PATCH" | "DELETE";
            operation: ${OPERATION_NAME};
        }
    `;

    const run = dedent`
        /**
         * Run the dispatcher of \`operation\`. Parameters that fail to decode give a
         * 400 response; every other error propagates.
         */
        export async function dispatch(
            api: ${API_INTERFACE},
            operation: ${OPERATION_NAME},
            req: ${DISPATCH_REQUEST},
        ): Promise<${DISPATCH_RESPONSE}> {
            try {
                return await handlers[operation](api, req);
            } catch (error) {
                if (error instanceof ${BAD_REQUEST_ERROR}) {
                    return { status: 400, body: { message: error.message } };
                }
                throw error;
            }
        }
    `;

    return {
        imports: [...modelImport(bodyTypes), { from: API_MODULE, typeNames: [API_INTERFACE] }],
        body: sections(RUNTIME, dispatchers, dispatch, routingTable(ctx), run),
    };
}
