// backend/services/endpoints/src/controllers/endpoint/handlers/upsert.ts

/**
 * POST /endpoints/:id — create or fully replace one endpoint.
 *
 * - 201 when nothing was stored under the body's identifier, 204 when an
 *   existing record was replaced.
 * - Replacing requires the path identifier to equal the body identifier;
 *   a mismatch is rejected before any write.
 * - The exists-then-write pair is not atomic. Two concurrent creates of the
 *   same new identifier both answer 201 and the later HSET wins.
 */

import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/src/middleware/asyncHandler";
import { extractIdentifier } from "../../../lib/identifier";
import { fromJson } from "../../../mappers/endpoint.mapper";
import { IdentifierMismatchError } from "../../../errors";
import type { EndpointRepo } from "../../../repo/endpointRepo";

export function upsert(repo: EndpointRepo): RequestHandler {
  return asyncHandler(async (req, res) => {
    const pathIdentifier = extractIdentifier(req.path);
    const endpoint = fromJson(typeof req.body === "string" ? req.body : "");

    const exists = await repo.exists(endpoint.identifier);
    if (exists && pathIdentifier !== endpoint.identifier) {
      throw new IdentifierMismatchError(pathIdentifier, endpoint.identifier);
    }

    await repo.put(endpoint);

    req.log.info(
      { identifier: endpoint.identifier },
      exists ? "endpoint updated" : "endpoint created"
    );
    res.status(exists ? 204 : 201).end();
  });
}
