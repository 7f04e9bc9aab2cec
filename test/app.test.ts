import { fileURLToPath } from "node:url";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { PpiContext } from "../services/ppi.context.ts";
import { buildApp } from "../src/app.ts";

const silent = { info() {}, warn() {}, debug() {} };

const EDGES = fileURLToPath(new URL("./fixtures/edges.csv", import.meta.url));
const IDMAP = fileURLToPath(new URL("./fixtures/idmap.csv", import.meta.url));

describe("HTTP API", () => {
  let ctx: PpiContext;
  let app: FastifyInstance;

  beforeAll(async () => {
    ctx = await PpiContext.open({ edges: { location: EDGES }, idmap: { location: IDMAP }, log: silent });
    app = await buildApp({ logger: false, ppi: { context: ctx, closeOnShutdown: true } });
  });

  afterAll(async () => {
    await app.close();
  });

  it("GET /health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("GET /proteins/search ranks candidates", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/search?q=Q5T5U3&limit=2" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      results: [
        { id: "Q5T5U3", displayName: "Rho GTPase-activating protein 21", category: "Cytoplasm" },
        { id: "Q5T5U3-2", displayName: "Rho GTPase-activating protein 21 isoform 2", category: "Nucleus" },
      ],
    });
  });

  it("GET /proteins/search without q is a 400", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/search" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Invalid query parameters: q: Required" });
  });

  it("GET /proteins/:id returns the display name", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/A0A001" });
    expect(res.json()).toEqual({ id: "A0A001", displayName: "A0A001" });
  });

  it("GET /proteins/:id/categories filters by strength", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/Q5T5U3/categories?strength=moderate" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ categories: ["Golgi apparatus", "Plasma membrane"] });
  });

  it("GET /proteins/:id/categories treats strength=any as no filter", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/Q5T5U3/categories?strength=any&minScore=0.5" });
    expect(res.json()).toEqual({
      categories: ["Extracellular", "Golgi apparatus", "Mitochondrion", "Plasma membrane"],
    });
  });

  it("GET /proteins/:id/interactions takes comma-separated categories", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/proteins/Q5T5U3/interactions?minScore=0.5&category=Golgi%20apparatus,Plasma%20membrane",
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.id).toBe("Q5T5U3");
    expect(body.displayName).toBe("Rho GTPase-activating protein 21");
    expect(body.interactions.map((r: { partnerId: string }) => r.partnerId)).toEqual(["P00002", "P00003"]);
  });

  it("GET /proteins/:id/interactions takes repeated categories", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/proteins/Q5T5U3/interactions?category=Unknown&category=Extracellular",
    });
    expect(res.json().interactions.map((r: { partnerId: string }) => r.partnerId)).toEqual([
      "O00001",
      "X99999",
      "A0A001",
    ]);
  });

  it("GET /proteins/:id/interactions rejects a limit below 100", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/Q5T5U3/interactions?limit=50" });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Invalid query parameters: limit: Number must be greater than or equal to 100",
    });
  });

  it("GET /proteins/:id/interactions rejects an unknown category", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/Q5T5U3/interactions?category=Vacuole" });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toMatch(/^Invalid query parameters: category\.0: /);
  });

  it("GET /proteins/:id/interactions returns 200 and an empty list for unknown proteins", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/NOPE42/interactions" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ id: "NOPE42", displayName: "NOPE42", interactions: [] });
  });

  it("GET /proteins/:id/interactions.csv downloads the filtered rows", async () => {
    const res = await app.inject({ method: "GET", url: "/proteins/Q5T5U3/interactions.csv?strength=strong" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/csv; charset=utf-8");
    expect(res.headers["content-disposition"]).toBe('attachment; filename="Q5T5U3_interactions.csv"');
    expect(res.body).toBe(
      [
        "partner_id,partner_protein_name,partner_location_category,score,strength",
        "P12345,Q5T5U3-interacting kinase,Mitochondrion,0.95,strong",
        "O00001,Serum albumin,Extracellular,0.8,strong",
        "",
      ].join("\n")
    );
  });

  it("closes an adopted context on shutdown when asked", async () => {
    const own = await PpiContext.open({ edges: { location: EDGES }, idmap: { location: IDMAP }, log: silent });
    const other = await buildApp({ logger: false, ppi: { context: own, closeOnShutdown: true } });
    await other.close();
    expect(own.isClosed()).toBe(true);
  });
});
