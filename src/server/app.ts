/**
 * app.ts — HTTP API for the dashboard
 *
 * Read paths decode each parameter's comment into { mapping, note };
 * mapping writes encode { symbol, note } back into the comment.
 */

import { createServer, type Server } from "node:http";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { z } from "zod";
import type { ParameterBridge } from "../bridge/types.js";
import { isBridgeError, type BridgeErrorCode } from "../bridge/errors.js";
import {
  DEFAULT_NAMESPACE,
  encodeComment,
  indexSymbols,
  isValidNamespace,
  isValidSymbol,
  symbolOwner,
} from "../mapping/comment.js";
import type { MappingStore } from "../mapping/store.js";
import { toParameterView } from "./views.js";
import { log } from "../ui/terminal.js";

// ─── Types ───────────────────────────────────────────────

export type RequestLogger = (method: string, path: string, status: number, ms: number) => void;

export interface AppOptions {
  bridge: ParameterBridge;
  store: MappingStore;
  allowedOrigins: string[];
  version?: string;
  /** Called once per finished request (default: log.request) */
  onRequest?: RequestLogger;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly issues?: z.ZodIssue[],
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const STATUS_BY_CODE: Record<BridgeErrorCode, number> = {
  not_found: 404,
  read_only: 409,
  no_document: 409,
  unsupported_document: 409,
  unavailable: 503,
  host_error: 502,
};

// ─── Request Bodies ──────────────────────────────────────

const SetValueBodySchema = z.union([
  z.object({ value: z.number().finite() }).strict(),
  z.object({ expression: z.string().trim().min(1) }).strict(),
]);

// "#" would end the mapping part early and ":" would split the symbol, so neither can be stored.
const SymbolSchema = z
  .string()
  .trim()
  .refine((s) => !s || (isValidSymbol(s) && !s.includes("#")), "Symbol must not contain ':' or '#'");

const SetMappingBodySchema = z.object({
  symbol: SymbolSchema.nullable(),
  note: z.string().nullable().optional(),
  namespace: z
    .string()
    .refine(isValidNamespace, "Namespace must be CA followed by digits")
    .optional(),
});

const SetMappingBlobBodySchema = z.object({ content: z.string() });

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(400, "Invalid request body", parsed.error.issues);
  }
  return parsed.data;
}

// ─── App ─────────────────────────────────────────────────

export function createApp(options: AppOptions): Express {
  const { bridge, store } = options;
  const onRequest = options.onRequest ?? log.request;

  const app = express();
  app.use(
    cors({
      origin: options.allowedOrigins,
      methods: ["GET", "PUT", "DELETE"],
    }),
  );
  app.use(express.json());
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => onRequest(req.method, req.originalUrl, res.statusCode, Date.now() - start));
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, version: options.version ?? "0.0.0" });
  });

  app.get("/document", async (_req, res) => {
    res.json(await bridge.getDocument());
  });

  // ─── Parameters ───

  app.get("/parameters", async (_req, res) => {
    const { document, parameters } = await bridge.listParameters();
    res.json({ document, parameters: parameters.map(toParameterView) });
  });

  app.get("/parameters/:name", async (req, res) => {
    res.json(toParameterView(await bridge.getParameter(req.params.name)));
  });

  app.put("/parameters/:name/value", async (req, res) => {
    const body = parseBody(SetValueBodySchema, req.body);
    const updated =
      "value" in body
        ? await bridge.setValue(req.params.name, body.value)
        : await bridge.setExpression(req.params.name, body.expression);
    res.json(toParameterView(updated));
  });

  app.put("/parameters/:name/mapping", async (req, res) => {
    const name = req.params.name;
    const body = parseBody(SetMappingBodySchema, req.body);

    if (body.symbol) {
      const { parameters } = await bridge.listParameters();
      if (!parameters.some((p) => p.name === name)) {
        throw new HttpError(404, `Parameter not found: ${name}`);
      }
      const owner = symbolOwner(indexSymbols(parameters.map(toParameterView)), body.symbol);
      if (owner !== undefined && owner !== name) {
        throw new HttpError(409, `Symbol "${body.symbol}" is already bound to ${owner}`);
      }
    }

    const comment = encodeComment(body.symbol, body.note, body.namespace ?? DEFAULT_NAMESPACE);
    res.json(toParameterView(await bridge.setComment(name, comment)));
  });

  app.delete("/parameters/:name/mapping", async (req, res) => {
    res.json(toParameterView(await bridge.setComment(req.params.name, "")));
  });

  app.get("/symbols", async (_req, res) => {
    const { parameters } = await bridge.listParameters();
    res.json(indexSymbols(parameters.map(toParameterView)));
  });

  // ─── Mapping Blob ───

  async function activeDocumentPath(): Promise<string> {
    const doc = await bridge.getDocument();
    if (!doc.fullPath) {
      throw new HttpError(409, "Save the document before storing a mapping");
    }
    return doc.fullPath;
  }

  app.get("/mapping", async (_req, res) => {
    const document = await activeDocumentPath();
    const entry = store.read(document);
    res.json({
      document,
      content: entry?.content ?? null,
      updatedAt: entry?.updatedAt ?? null,
    });
  });

  app.put("/mapping", async (req, res) => {
    const { content } = parseBody(SetMappingBlobBodySchema, req.body);
    res.json(store.write(await activeDocumentPath(), content));
  });

  app.delete("/mapping", async (_req, res) => {
    res.json({ removed: store.remove(await activeDocumentPath()) });
  });

  // ─── Errors ───

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json(err.issues ? { error: err.message, issues: err.issues } : { error: err.message });
      return;
    }
    if (isBridgeError(err)) {
      res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
      return;
    }
    // express.json() reports malformed bodies as SyntaxErrors
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Unhandled error: ${message}`);
    res.status(500).json({ error: message });
  });

  return app;
}

/**
 * Listen on host:port and resolve once the socket is bound.
 */
export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
