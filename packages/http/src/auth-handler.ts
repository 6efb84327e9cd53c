import { z } from "zod";

import { ROLES, type AuthContext, type CoreError, type Role } from "@credential-core/contracts";
import {
  createCoreCounter,
  createCoreHistogram,
  getCoreTracer,
  runWithSpan,
  SpanStatusCode,
  type CoreLogger,
  type CoreTracer,
} from "@credential-core/telemetry";

import type { AuthCore } from "./auth-core.js";
import { requestError } from "./errors.js";
import { describeFailure } from "./failure-response.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ProtectedRoute {
  readonly method: HttpMethod;
  readonly path: string;
  readonly requiredRole?: Role;
  readonly action?: string;
  readonly handler: (context: AuthContext, request: Request) => Promise<Response> | Response;
}

export interface AuthHandlerMetrics {
  readonly requestCounter: ReturnType<typeof createCoreCounter>;
  readonly requestDuration: ReturnType<typeof createCoreHistogram>;
}

export interface AuthHandlerOptions {
  readonly core: AuthCore;
  readonly protectedRoutes?: ReadonlyArray<ProtectedRoute>;
  readonly healthPath?: string;
  readonly metrics?: AuthHandlerMetrics;
  readonly tracer?: CoreTracer;
  readonly logger?: CoreLogger;
}

const registerBodySchema = z.object({
  username: z.string(),
  password: z.string(),
  role: z.enum(ROLES).optional(),
  email: z.string().optional(),
  full_name: z.string().optional(),
});

const loginBodySchema = z.object({
  username: z.string(),
  password: z.string(),
});

type RouteHandler = (request: Request) => Promise<Response>;

export const jsonResponse = (status: number, body: unknown, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });

const normalizePath = (path: string): string => (path.endsWith("/") && path !== "/" ? path.slice(0, -1) : path);

const routeKey = (method: string, path: string): string => `${method.toUpperCase()} ${normalizePath(path)}`;

export const createAuthHandler = (options: AuthHandlerOptions): ((request: Request) => Promise<Response>) => {
  const { core } = options;
  const logger = (options.logger ?? core.logger).child({ component: "http" });
  const tracer = options.tracer ?? getCoreTracer();
  const metrics = options.metrics ?? createDefaultMetrics();
  const healthPath = normalizePath(options.healthPath ?? "/healthz");

  const failure = (error: CoreError): Response => {
    const described = describeFailure(error, core.scheme);
    return jsonResponse(described.status, described.body, described.headers);
  };

  const readBody = async <TSchema extends z.ZodTypeAny>(
    request: Request,
    schema: TSchema,
  ): Promise<z.infer<TSchema> | undefined> => {
    let raw: unknown;
    try {
      raw = await request.json();
    } catch {
      return undefined;
    }
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  };

  const invalidBody = (): Response => failure(requestError("request.invalid_body", "Request body failed validation"));

  const register: RouteHandler = async (request) => {
    const body = await readBody(request, registerBodySchema);
    if (!body) {
      return invalidBody();
    }
    const profile: Record<string, unknown> = {};
    if (body.email !== undefined) {
      profile.email = body.email;
    }
    if (body.full_name !== undefined) {
      profile.full_name = body.full_name;
    }

    const registered = await core.register({
      username: body.username,
      password: body.password,
      role: body.role,
      profile,
    });
    if (!registered.ok) {
      return failure(registered.error);
    }
    return jsonResponse(201, { message: "User registered successfully", username: registered.value.username });
  };

  const login: RouteHandler = async (request) => {
    const body = await readBody(request, loginBodySchema);
    if (!body) {
      return invalidBody();
    }

    const result = await core.login(body.username, body.password);
    if (!result.ok) {
      return failure(result.error);
    }

    if (result.value.scheme === "bearer") {
      const { session } = result.value;
      return jsonResponse(200, {
        token: session.token,
        tokenType: session.tokenType,
        username: session.username,
        expiresInSeconds: session.expiresInSeconds,
      });
    }

    const { context } = result.value;
    return jsonResponse(200, {
      message: "Login successful",
      username: context.username,
      ...(context.role ? { role: context.role } : {}),
      ...(Object.keys(context.profile).length > 0 ? { profile: context.profile } : {}),
    });
  };

  const guard = (route: Pick<ProtectedRoute, "requiredRole" | "action" | "handler">): RouteHandler =>
    async (request) => {
      const authenticated = await core.authenticate(request.headers.get("authorization"));
      if (!authenticated.ok) {
        return failure(authenticated.error);
      }
      const authorized = core.authorize(authenticated.value, route);
      if (!authorized.ok) {
        return failure(authorized.error);
      }
      return route.handler(authorized.value, request);
    };

  const routes = new Map<string, RouteHandler>([
    [routeKey("POST", "/register"), register],
    [routeKey("POST", "/login"), login],
    [routeKey("GET", "/me"), guard({ handler: (context) => jsonResponse(200, context) })],
    [routeKey("GET", "/"), async () => jsonResponse(200, describeEndpoints(core.scheme, options.protectedRoutes))],
  ]);
  for (const route of options.protectedRoutes ?? []) {
    routes.set(routeKey(route.method, route.path), guard(route));
  }

  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const path = normalizePath(url.pathname);
    if (request.method === "GET" && path === healthPath) {
      return jsonResponse(200, { ok: true });
    }

    const key = routeKey(request.method, path);
    const route = routes.get(key);
    const routeAttribute = route ? key : "unmatched";
    const start = performance.now();

    try {
      const response = await runWithSpan(
        tracer,
        "credential_core.request",
        async (span) => {
          span.setAttribute("http.method", request.method);
          span.setAttribute("http.target", url.pathname);
          try {
            const routed = route ? await route(request) : jsonResponse(404, { detail: "Not found" });
            span.setAttribute("http.status_code", routed.status);
            return routed;
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            span.setAttribute("http.status_code", 500);
            logger.error("http.request_failed", { route: routeAttribute, error: message });
            throw error;
          }
        },
        { "http.route": routeAttribute },
      );
      recordRequestMetrics(metrics, routeAttribute, response.status, performance.now() - start);
      logger.debug("http.request_completed", { route: routeAttribute, status: response.status });
      return response;
    } catch {
      recordRequestMetrics(metrics, routeAttribute, 500, performance.now() - start);
      return jsonResponse(500, { error: "internal_error" });
    }
  };
};

const describeEndpoints = (
  scheme: AuthCore["scheme"],
  protectedRoutes: ReadonlyArray<ProtectedRoute> | undefined,
): Record<string, unknown> => ({
  message: "Credential core",
  scheme,
  endpoints: [
    "POST /register",
    "POST /login",
    "GET /me",
    ...(protectedRoutes ?? []).map((route) => {
      const key = routeKey(route.method, route.path);
      return route.requiredRole ? `${key} (${route.requiredRole} only)` : key;
    }),
  ],
});

const recordRequestMetrics = (metrics: AuthHandlerMetrics, route: string, status: number, durationMs: number): void => {
  metrics.requestCounter.add(1, { route, status });
  metrics.requestDuration.record(durationMs, { route, status });
};

const createDefaultMetrics = (): AuthHandlerMetrics => ({
  requestCounter: createCoreCounter("credential_core_requests_total", {
    description: "Count of credential core HTTP requests",
  }),
  requestDuration: createCoreHistogram("credential_core_request_duration_ms", {
    description: "Credential core HTTP request duration",
    unit: "ms",
  }),
});
