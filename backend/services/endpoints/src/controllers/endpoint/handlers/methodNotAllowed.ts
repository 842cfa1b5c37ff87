// backend/services/endpoints/src/controllers/endpoint/handlers/methodNotAllowed.ts
import type { RequestHandler } from "express";

export function methodNotAllowed(allow: string[]): RequestHandler {
  const allowHeader = allow.join(", ");
  return (req, res) => {
    req.log.warn(
      { remote: req.ip, method: req.method },
      `request rejected: method ${req.method} not allowed`
    );
    res.setHeader("Allow", allowHeader);
    res.status(405).end();
  };
}
