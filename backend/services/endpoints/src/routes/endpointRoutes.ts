// backend/services/endpoints/src/routes/endpointRoutes.ts
import express, { Router } from "express";

// Direct handler imports (no barrels)
import { list } from "../controllers/endpoint/handlers/list";
import { read } from "../controllers/endpoint/handlers/read";
import { upsert } from "../controllers/endpoint/handlers/upsert";
import { methodNotAllowed } from "../controllers/endpoint/handlers/methodNotAllowed";
import type { EndpointRepo } from "../repo/endpointRepo";

/** Largest POST body accepted; anything bigger is a 413. */
const BODY_LIMIT = "64kb";

/**
 * Policy:
 * - GET  /endpoints      list
 * - GET  /endpoints/:id  read one
 * - POST /endpoints/:id  create or replace (body read as raw text, any content type)
 * - any other method on either path → 405 (HEAD included)
 *
 * The router is strict and case-sensitive: "/endpoints/" and
 * "/endpoints/a/b" reach the single-resource handlers and fail identifier
 * validation there.
 */
export function endpointRoutes(repo: EndpointRepo): Router {
  const router = Router({ strict: true, caseSensitive: true });

  // one-liners only — no logic here
  router
    .route("/endpoints")
    .head(methodNotAllowed(["GET"]))
    .get(list(repo))
    .all(methodNotAllowed(["GET"]));

  router
    .route("/endpoints/*")
    .head(methodNotAllowed(["GET", "POST"]))
    .get(read(repo))
    .post(express.text({ type: () => true, limit: BODY_LIMIT }), upsert(repo))
    .all(methodNotAllowed(["GET", "POST"]));

  return router;
}
