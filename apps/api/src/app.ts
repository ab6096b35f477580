import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import type { z } from "zod";
import {
  ExpressionError,
  LayoutInputError,
  LayoutRulesError,
  parseLayout,
  ProcessorSpecError,
  RequiredAnchorError,
  validate,
  type Logger,
} from "@layout-rules/core";
import { executeBody, issuesOf, layoutBody, routeBody, validateBody } from "./schemas";
import { NotFoundError, type ProcessorService } from "./service";

export interface AppDeps {
  service: ProcessorService;
  log: Logger;
  bodyLimit?: string;
  fingerprintBlocks?: number;
}

class BadRequestError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`);
    this.name = "BadRequestError";
  }
}

export function statusFor(err: unknown): number {
  if (err instanceof BadRequestError) return 400;
  if (err instanceof ProcessorSpecError || err instanceof LayoutInputError || err instanceof ExpressionError) return 400;
  if (err instanceof RequiredAnchorError) return 422;
  if (err instanceof NotFoundError) return 404;
  return 500;
}

export function errorBody(err: unknown): Record<string, unknown> {
  if (err instanceof LayoutRulesError) {
    const issues = err instanceof ProcessorSpecError || err instanceof LayoutInputError ? err.issues : undefined;
    const anchor = err instanceof RequiredAnchorError ? err.anchor : undefined;
    return { error: err.code, message: err.message, ...(issues ? { issues } : {}), ...(anchor ? { anchor } : {}) };
  }
  if (err instanceof BadRequestError) return { error: "invalid_request", message: err.message, issues: err.issues };
  if (err instanceof NotFoundError) return { error: "not_found", message: err.message };
  return { error: "internal_error", message: err instanceof Error ? err.message : String(err) };
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new BadRequestError(issuesOf(parsed.error));
  return parsed.data;
}

type Handler = (req: Request, res: Response) => unknown;

// Express 4 does not forward rejected promises; route them to the error middleware.
const route = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => fn(req, res))
    .catch(next);
};

export function createApp({ service, log, bodyLimit = "10mb", fingerprintBlocks }: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: bodyLimit }));
  app.use(cors());
  app.use(helmet());
  // Successful responses are noise at dev volume
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers["x-request-id"];
    res.locals.request_id = typeof header === "string" && header ? header : uuidv4();
    res.setHeader("x-request-id", res.locals.request_id);
    next();
  });

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.post(
    "/processors",
    route((req, res) => {
      res.status(201).json(service.create(req.body));
    })
  );

  app.get(
    "/processors",
    route((req, res) => {
      const documentType = typeof req.query.document_type === "string" ? req.query.document_type : undefined;
      res.json(service.list(documentType));
    })
  );

  app.get(
    "/processors/:id",
    route((req, res) => {
      res.json(service.get(req.params.id));
    })
  );

  app.delete(
    "/processors/:id",
    route((req, res) => {
      service.delete(req.params.id);
      res.status(204).end();
    })
  );

  app.post(
    "/processors/:id/execute",
    route(async (req, res) => {
      const body = parseBody(executeBody, req.body);
      if (body.data_base64 !== undefined) {
        const bytes = new Uint8Array(Buffer.from(body.data_base64, "base64"));
        res.json(await service.executeDocument(req.params.id, bytes, { filename: body.filename, mime: body.mime }));
        return;
      }
      res.json(service.execute(req.params.id, parseLayout(body.layout, fingerprintBlocks)));
    })
  );

  app.post(
    "/execute",
    route((req, res) => {
      const body = parseBody(routeBody, req.body);
      res.json(service.route(parseLayout(body.layout, fingerprintBlocks), body.processor_id));
    })
  );

  app.post(
    "/validate",
    route((req, res) => {
      const body = parseBody(validateBody, req.body);
      res.json(validate(body.data, body.validations, log));
    })
  );

  app.post(
    "/layout/fingerprint",
    route((req, res) => {
      const body = parseBody(layoutBody, req.body);
      res.json({ layout_hash: parseLayout(body.layout, fingerprintBlocks).layout_hash });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(err);
    const ctx = { request_id: res.locals.request_id, method: req.method, path: req.path, status };
    if (status >= 500) log.error("api.request.error", { ...ctx, error: err instanceof Error ? err.message : String(err) });
    else log.warn("api.request.rejected", { ...ctx, error: err instanceof Error ? err.message : String(err) });
    res.status(status).json(errorBody(err));
  });

  return app;
}
