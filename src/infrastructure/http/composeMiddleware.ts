import type { Middleware, RequestHandler } from "./http.types";

/**
 * Folds `middlewares` around `terminal`; the first entry runs outermost.
 */
export const composeMiddleware = (middlewares: readonly Middleware[], terminal: RequestHandler): RequestHandler =>
  middlewares.reduceRight<RequestHandler>((next, middleware) => (request) => middleware.handle(request, next), terminal);
