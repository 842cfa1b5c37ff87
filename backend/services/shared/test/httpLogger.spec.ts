// backend/services/shared/test/httpLogger.spec.ts
import { describe, it, expect, vi } from "vitest";
import { Writable } from "node:stream";
import express from "express";
import pino from "pino";
import request from "supertest";
import { makeHttpLogger } from "../src/middleware/httpLogger";

describe("makeHttpLogger", () => {
  it("writes the service binding once per request line", async () => {
    const lines: string[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _enc, cb) {
        lines.push(chunk.toString());
        cb();
      },
    });
    const base = pino({ base: { service: "svc-test" }, level: "info" }, sink);

    const app = express();
    app.use(makeHttpLogger(base));
    app.get("/ping", (_req, res) => {
      res.status(200).end();
    });

    const res = await request(app).get("/ping");
    expect(res.status).toBe(200);

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    expect(lines[0].match(/"service":/g)).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ service: "svc-test", msg: "request completed" });
  });
});
