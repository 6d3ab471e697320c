import express from "express";
import type { NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import { z } from "zod";
import { describeError, InvalidInputError } from "./errors";
import { toErrorResponse, toSearchResponse } from "./response";
import type { QueryRouter } from "./router";

const searchRequestSchema = z.object({
  query: z.string({
    required_error: "Missing required field: query",
    invalid_type_error: "Field query must be a string",
  }),
});

function bodyErrorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export interface AppOptions {
  router: QueryRouter;
  corsOrigins: string[];
}

export function createApp({ router, corsOrigins }: AppOptions) {
  const app = express();
  app.use(cors({
    origin: corsOrigins.includes("*") ? "*" : corsOrigins,
    methods: ["GET", "POST", "OPTIONS"],
  }));
  app.use(bodyParser.json());

  app.get("/", (_req, res) => {
    res.json({ status: "ok", message: "Query router is running" });
  });

  app.post("/search", async (req, res) => {
    try {
      const parsed = searchRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidInputError(parsed.error.issues[0]?.message ?? "Invalid request body");
      }

      const result = await router.route(parsed.data.query);
      res.json(toSearchResponse(result));
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) {
        console.error("[Server] /search error:", err);
      }
      res.status(status).json(body);
    }
  });

  // body-parser rejects bad bodies before any route runs; its errors carry a 4xx status.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const clientStatus = bodyErrorStatus(err);
    if (clientStatus !== undefined) {
      const message = err instanceof SyntaxError ? "Malformed JSON body" : describeError(err);
      const { body } = toErrorResponse(new InvalidInputError(message));
      res.status(clientStatus).json(body);
      return;
    }

    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      console.error("[Server] Error:", err);
    }
    res.status(status).json(body);
  });

  return app;
}
