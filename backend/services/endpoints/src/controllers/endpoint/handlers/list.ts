// backend/services/endpoints/src/controllers/endpoint/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/src/middleware/asyncHandler";
import { toPayload } from "../../../mappers/endpoint.mapper";
import type { EndpointRepo } from "../../../repo/endpointRepo";

// GET /endpoints → 200 + every stored endpoint (order unspecified)
export function list(repo: EndpointRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const endpoints = await repo.listAll();
    req.log.debug({ count: endpoints.length }, "[EndpointHandlers.list] exit");
    res.status(200).json(endpoints.map(toPayload));
  });
}
