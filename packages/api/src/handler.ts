import { type ApiErrorResponse, AppError, ValidationError } from "@slidetext/utils";
import type { ApiContext } from "./context.js";
import * as extract from "./routes/extract.js";
import * as status from "./routes/status.js";

type Handler = (request: Request, ctx: ApiContext) => Promise<Response>;

interface Route {
  method: string;
  path: string;
  handler: Handler;
}

function route(method: string, path: string, handler: Handler): Route {
  return { method, path, handler };
}

const routes: Route[] = [
  route("GET", "/", status.getWelcome),
  route("POST", "/extract", extract.extractText),
];

function errorResponse(statusCode: number, body: ApiErrorResponse): Response {
  return Response.json(body, { status: statusCode });
}

export function createApiHandler(ctx: ApiContext) {
  return async (request: Request): Promise<Response> => {
    const url = new URL(request.url);
    const method = request.method;
    // Tolerate a trailing slash, as in "/extract/".
    const path = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, "") : url.pathname;

    for (const r of routes) {
      if (r.method !== method || r.path !== path) continue;

      try {
        return await r.handler(request, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          if (err.statusCode >= 500) console.error(`API error ${err.code}:`, err.message);
          return errorResponse(err.statusCode, {
            error: err.message,
            code: err.code,
            ...(err instanceof ValidationError && err.details ? { details: err.details } : {}),
          });
        }

        console.error("Unhandled API error:", err);
        return errorResponse(500, { error: "Internal server error", code: "INTERNAL_ERROR" });
      }
    }

    return errorResponse(404, { error: "Route not found", code: "NOT_FOUND" });
  };
}
