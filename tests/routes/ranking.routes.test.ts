import { beforeAll, describe, expect, it } from "@jest/globals";
import { Application } from "express";
import request from "supertest";
import { createApp } from "../../src/app";
import { createScoringConfig } from "../../src/config/scoring.config";
import { InMemoryMetricStore } from "../../src/services/metricStore/inMemoryMetricStore";
import { AgentRankingService } from "../../src/services/scoring/agentRanking.service";
import { goldenSnapshot, refinedRegime, sarahJohnson } from "../fixtures/rankingFixture";

describe("ranking routes", () => {
  let app: Application;

  beforeAll(async () => {
    const metricStore = new InMemoryMetricStore(goldenSnapshot);
    const rankingService = new AgentRankingService(metricStore, {
      defaultRegime: "refined",
      regimes: { refined: createScoringConfig(refinedRegime) },
    });
    app = await createApp({ metricStore, rankingService });
  });

  it("POST /api/v1/rankings returns the ranked pool", async () => {
    const response = await request(app)
      .post("/api/v1/rankings")
      .send(sarahJohnson)
      .expect(200);

    expect(response.body.success).toBe(true);
    expect(response.body.data.regime).toBe("refined");
    expect(response.body.data.customerProfile).toEqual(sarahJohnson);
    expect(response.body.data.agents.map((a: { agentId: number }) => a.agentId)).toEqual([1, 2, 3]);
  });

  it("truncates the returned agents to the limit but reports the full count", async () => {
    const response = await request(app)
      .post("/api/v1/rankings?limit=1")
      .send(sarahJohnson)
      .expect(200);

    expect(response.body.data.agentCount).toBe(3);
    expect(response.body.data.agents).toHaveLength(1);
    expect(response.body.data.agents[0].rank).toBe(1);
  });

  it("rejects a destination outside the closed set with 400", async () => {
    const response = await request(app)
      .post("/api/v1/rankings")
      .send({ ...sarahJohnson, destination: "Pluto" })
      .expect(400);

    expect(response.body.error).toBe("Validation failed");
    expect(response.body.details.map((d: { field: string }) => d.field)).toEqual(["destination"]);
  });

  it("rejects a non-numeric limit", async () => {
    const response = await request(app)
      .post("/api/v1/rankings?limit=all")
      .send(sarahJohnson)
      .expect(400);

    expect(response.body.error).toBe("Query validation failed");
  });

  it("reports the query before the body when both are invalid", async () => {
    const response = await request(app)
      .post("/api/v1/rankings?limit=0")
      .send({ ...sarahJohnson, destination: "Pluto" })
      .expect(400);

    expect(response.body.error).toBe("Query validation failed");
    expect(response.body.details.map((d: { field: string }) => d.field)).toEqual(["limit"]);
  });

  it("maps an unknown regime to 400 with details", async () => {
    const response = await request(app)
      .post("/api/v1/rankings?regime=experimental")
      .send(sarahJohnson)
      .expect(400);

    expect(response.body.error).toBe('Unknown scoring regime "experimental"');
    expect(response.body.details).toEqual([
      { field: "regime", message: "Expected one of: refined" },
    ]);
  });

  it("GET /api/v1/rankings/regimes lists configured regimes", async () => {
    const response = await request(app).get("/api/v1/rankings/regimes").expect(200);

    expect(response.body.data).toEqual({ defaultRegime: "refined", regimes: ["refined"] });
  });

  it("echoes the caller's request id", async () => {
    const response = await request(app)
      .get("/health/live")
      .set("x-request-id", "test-request-id")
      .expect(200);

    expect(response.headers["x-request-id"]).toBe("test-request-id");
  });

  it("reports readiness from the metric store", async () => {
    const response = await request(app).get("/health/ready").expect(200);

    expect(response.body.status).toBe("ready");
    expect(response.body.checks.metricStore).toBe("healthy");
  });

  it("returns 404 for unknown routes", async () => {
    await request(app).get("/api/v1/unknown").expect(404);
  });
});
