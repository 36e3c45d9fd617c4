import type { FastifyInstance, FastifyReply } from "fastify";
import type { ZodError } from "zod";

export type ErrorBody = {
  status: "error";
  error: string;
  issues?: { path: string; message: string }[];
};

export function sendBadRequest(reply: FastifyReply, error: ZodError): FastifyReply {
  const body: ErrorBody = {
    status: "error",
    error: "Bad request",
    issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
  };
  return reply.status(400).send(body);
}

/** Наружу — всегда JSON { status: "error" }, без стектрейсов. */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((err, req, reply) => {
    const code = err.statusCode ?? 500;
    if (code >= 400 && code < 500) {
      req.log.info({ step: "request", code, err: err.message });
      const body: ErrorBody = { status: "error", error: code === 400 ? "Bad request" : err.message };
      return reply.status(code).send(body);
    }
    req.log.error({ err }, "unhandled error");
    const body: ErrorBody = { status: "error", error: "Internal error" };
    return reply.status(500).send(body);
  });

  app.setNotFoundHandler((_req, reply) => {
    const body: ErrorBody = { status: "error", error: "Not found" };
    return reply.status(404).send(body);
  });
}
