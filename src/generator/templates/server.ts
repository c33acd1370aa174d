/**
 * Server bootstrap template (`server.ts`)
 *
 * Registers every route on a fastify instance. Each handler turns the fastify
 * request into a `DispatchRequest` and hands it to `dispatch`.
 */
import type { PathSegment, Route } from "../../ir/types";
import { allRoutes } from "../../ir/utils";
import { API_INTERFACE, DISPATCH_REQUEST, OPERATION_NAME, SERVE_OPTIONS, memberName } from "../naming";
import { dedent, sections } from "./helpers";
import { API_MODULE, DISPATCHER_MODULE, type EmittedFile, type TemplateContext } from "./types";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;

/**
 * fastify URL of a route, with `:name` placeholders
 */
export function fastifyUrl(segments: readonly PathSegment[]): string {
    if (segments.length === 0) return "/";
    return segments.map((s) => "/" + (s.kind === "literal" ? s.value : `:${s.name}`)).join("");
}

function registration(route: Route): string {
    const url = JSON.stringify(fastifyUrl(route.segments));
    const operation = JSON.stringify(memberName(route.operationId));
    return `    app.route({ method: "${route.method.verb}", url: ${url}, handler: handle(api, ${operation}) });`;
}

export function templateServer(ctx: TemplateContext): EmittedFile {
    const routes = allRoutes(ctx.model.routes);
    // fastify adds a HEAD route for every GET unless told otherwise
    const hasHead = routes.some((route) => route.method.verb === "HEAD");
    const serverOptions = hasHead ? "{ exposeHeadRoutes: false, ...options }" : "options";
    const registrations = routes.map(registration).join("\n");

    const helpers = dedent`
        export interface ${SERVE_OPTIONS} {
            host?: string;
            port?: number;
        }

        function stringRecord(value: unknown): Record<string, string | undefined> {
            const record: Record<string, string | undefined> = {};
            if (typeof value === "object" && value !== null) {
                for (const [key, item] of Object.entries(value)) {
                    if (typeof item === "string") record[key] = item;
                }
            }
            return record;
        }

        function queryRecord(value: unknown): Record<string, string | string[] | undefined> {
            const record: Record<string, string | string[] | undefined> = {};
            if (typeof value === "object" && value !== null) {
                for (const [key, item] of Object.entries(value)) {
                    if (typeof item === "string") {
                        record[key] = item;
                    } else if (Array.isArray(item)) {
                        record[key] = item.filter((entry): entry is string => typeof entry === "string");
                    }
                }
            }
            return record;
        }

        function toDispatchRequest(request: FastifyRequest): ${DISPATCH_REQUEST} {
            return {
                params: stringRecord(request.params),
                query: queryRecord(request.query),
                body: request.body,
            };
        }

        function handle(api: ${API_INTERFACE}, operation: ${OPERATION_NAME}) {
            return async (request: FastifyRequest, reply: FastifyReply) => {
                const response = await dispatch(api, operation, toDispatchRequest(request));
                return reply.code(response.status).send(response.body);
            };
        }
    `;

    const create = [
        "/**",
        " * Build a fastify instance serving `api`. The instance is not listening yet.",
        " */",
        `export function createServer(api: ${API_INTERFACE}, options: FastifyServerOptions = {}): FastifyInstance {`,
        `    const app = fastify(${serverOptions});`,
        ...(registrations ? [registrations] : []),
        "    return app;",
        "}",
    ].join("\n");

    const serve = dedent`
        /**
         * Start serving \`api\`, on ${DEFAULT_HOST}:${DEFAULT_PORT} unless told otherwise.
         */
        export async function serve(
            api: ${API_INTERFACE},
            { host = "${DEFAULT_HOST}", port = ${DEFAULT_PORT} }: ${SERVE_OPTIONS} = {},
        ): Promise<FastifyInstance> {
            const app = createServer(api);
            await app.listen({ host, port });
            return app;
        }
    `;

    return {
        imports: [
            {
                from: "fastify",
                names: ["fastify"],
                typeNames: ["FastifyInstance", "FastifyReply", "FastifyRequest", "FastifyServerOptions"],
            },
            { from: API_MODULE, typeNames: [API_INTERFACE] },
            { from: DISPATCHER_MODULE, names: ["dispatch"], typeNames: [DISPATCH_REQUEST, OPERATION_NAME] },
        ],
        body: sections(helpers, create, serve),
    };
}
