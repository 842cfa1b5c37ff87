// backend/services/endpoints/src/controllers/endpoint/handlers/read.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/src/middleware/asyncHandler";
import { extractIdentifier } from "../../../lib/identifier";
import { toPayload } from "../../../mappers/endpoint.mapper";
import { NotFoundError } from "../../../errors";
import type { EndpointRepo } from "../../../repo/endpointRepo";

// GET /endpoints/:id → 200 | 400 invalid id | 404 | 500
export function read(repo: EndpointRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const identifier = extractIdentifier(req.path);

    const endpoint = await repo.get(identifier);
    if (!endpoint) throw new NotFoundError(identifier);

    res.status(200).json(toPayload(endpoint));
  });
}
