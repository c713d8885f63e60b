// backend/services/shared/test/problemJson.spec.ts
import express from "express";
import request from "supertest";
import { describe, it, expect } from "vitest";
import { HttpError } from "../http/errors";
import { asyncHandler } from "../middleware/asyncHandler";
import { errorProblemJson, notFoundProblemJson } from "../middleware/problemJson";

function makeApp() {
  const app = express();
  app.get(
    "/api/teapot",
    asyncHandler(async () => {
      throw new HttpError({
        status: 418,
        code: "TEAPOT",
        title: "I'm a teapot",
        detail: "short and stout",
        errors: [{ path: "spout", code: "custom", message: "too short" }],
      });
    })
  );
  app.get(
    "/api/boom",
    asyncHandler(async () => {
      throw new Error("mongo socket closed mid-query");
    })
  );
  app.post("/api/echo", express.json(), (req, res) => {
    res.json(req.body);
  });
  app.post("/api/tiny", express.json({ limit: "10b" }), (req, res) => {
    res.json(req.body);
  });

  app.use(notFoundProblemJson(["/api"]));
  app.use(errorProblemJson());
  return app;
}

describe("errorProblemJson", () => {
  it("renders an HttpError with its status, code and issues", async () => {
    const res = await request(makeApp()).get("/api/teapot");

    expect(res.status).toBe(418);
    expect(res.headers["content-type"]).toContain("application/problem+json");
    expect(res.body).toEqual({
      type: "about:blank",
      title: "I'm a teapot",
      status: 418,
      code: "TEAPOT",
      detail: "short and stout",
      errors: [{ path: "spout", code: "custom", message: "too short" }],
    });
  });

  it("hides the message of an unexpected error behind a generic 500", async () => {
    const res = await request(makeApp()).get("/api/boom");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      detail: "Unexpected error",
    });
  });

  it("keeps the 400 a body parser assigns to malformed JSON", async () => {
    const res = await request(makeApp())
      .post("/api/echo")
      .set("content-type", "application/json")
      .send("{oops");

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      title: "Bad Request",
      status: 400,
      code: "BAD_REQUEST",
    });
  });
  it("titles a body parser's 413 after its status", async () => {
    const res = await request(makeApp())
      .post("/api/tiny")
      .set("content-type", "application/json")
      .send('{"name":"far too long for the limit"}');

    expect(res.status).toBe(413);
    expect(res.body).toMatchObject({
      title: "Payload Too Large",
      status: 413,
      code: "PAYLOAD_TOO_LARGE",
    });
  });

  it("titles a body parser's 415 after its status", async () => {
    const res = await request(makeApp())
      .post("/api/echo")
      .set("content-type", "application/json; charset=latin1")
      .send('{"name":"x"}');

    expect(res.status).toBe(415);
    expect(res.body).toMatchObject({
      title: "Unsupported Media Type",
      status: 415,
      code: "UNSUPPORTED_MEDIA_TYPE",
    });
  });
});

describe("notFoundProblemJson", () => {
  it("answers problem+json under a known prefix", async () => {
    const res = await request(makeApp()).get("/api/nothing-here");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
    });
  });

  it("answers a bare 404 elsewhere", async () => {
    const res = await request(makeApp()).get("/static/logo.png");

    expect(res.status).toBe(404);
    expect(res.text).toBe("");
  });
});
