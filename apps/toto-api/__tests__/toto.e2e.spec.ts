import { INestApplication } from "@nestjs/common";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import { Registry } from "prom-client";
import { ProvablyFairService } from "@toto-sim/core-provably-fair";
import { verifyDraw } from "@toto-sim/toto-simulation";
import { createTotoTestHarness } from "../../test-utils/toto-test-harness";
import { InMemoryLogger, TestRngService } from "../../test-utils/test-helpers";

describe("TOTO API e2e", () => {
  let app: INestApplication;
  let rng: TestRngService;
  let logger: InMemoryLogger;
  let registry: Registry;

  beforeAll(async () => {
    rng = new TestRngService();
    ({ app, logger, registry } = await createTotoTestHarness({ rng }));
  });

  beforeEach(() => {
    rng.setNext(0);
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it("draws once and classifies a Group 4 result", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/draw")
      .send({ numbers: [40, 7, 4, 3, 2, 1], clientSeed: "test-client" })
      .expect(201);

    expect(res.body).toMatchObject({
      playerNumbers: [1, 2, 3, 4, 7, 40],
      winningNumbers: [1, 2, 3, 4, 5, 6],
      supplementary: 7,
      tier: "TIER4",
      label: "Group 4 Prize",
      matchCount: 4,
      matchingNumbers: [1, 2, 3, 4],
      supplementaryMatched: true,
      isJackpot: false,
      clientSeed: "test-client",
      nonce: 0,
    });
    expect(res.body.serverSeedHash).toMatch(/^[0-9a-f]{64}$/);
    expect(Number.isNaN(Date.parse(res.body.drawnAt))).toBe(false);
  });

  it("stops the simulation on the first jackpot", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/simulate")
      .send({ numbers: [1, 2, 3, 4, 5, 6], maxDraws: 500 })
      .expect(201);

    expect(res.body).toMatchObject({
      totalDraws: 1,
      maxDraws: 500,
      jackpotAchieved: true,
      stopReason: "JACKPOT",
      equivalentYears: 0,
      theoreticalOdds: "13983816",
    });
    expect(res.body.tiers[0]).toEqual({ tier: "JACKPOT", label: "Group 1 Prize", count: 1, percentage: 100 });
  });

  it("runs to the configured default when maxDraws is omitted", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/simulate")
      .send({ numbers: [10, 20, 30, 40, 41, 42] })
      .expect(201);

    expect(res.body).toMatchObject({
      totalDraws: 100,
      maxDraws: 100,
      jackpotAchieved: false,
      stopReason: "MAX_DRAWS",
      equivalentYears: 1,
    });
    const none = res.body.tiers.find((entry: { tier: string }) => entry.tier === "NONE");
    expect(none).toEqual({ tier: "NONE", label: "No prize", count: 100, percentage: 100 });
    expect(logger.find("toto.simulation.completed")?.meta).toMatchObject({ outcome: "exhausted", totalDraws: 100 });
  });

  it("rejects maxDraws above the configured limit", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/simulate")
      .send({ numbers: [1, 2, 3, 4, 5, 6], maxDraws: 5_000 })
      .expect(400);

    expect(res.body).toEqual({
      error: "INVALID_INPUT",
      message: "maxDraws must not exceed 1000",
      details: { maxDraws: 5_000, limit: 1_000 },
    });
  });

  it.each([
    [[1, 2, 3, 4, 5], "numbers must contain at least 6 elements"],
    [[1, 2, 3, 4, 5, 50], "each value in numbers must not be greater than 49"],
    [[1, 1, 2, 3, 4, 5], "numbers must be unique"],
    [[1, 2, 3, 4, 5, 6.5], "each value in numbers must be an integer number"],
  ])("rejects numbers %j", async (numbers, violation) => {
    const res = await request(app.getHttpServer()).post("/toto/draw").send({ numbers }).expect(400);

    expect(res.body.error).toBe("INVALID_INPUT");
    expect(res.body.message).toBe("Request validation failed");
    expect(res.body.details.violations).toContain(violation);
  });

  it("rejects a non-integer maxDraws", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/simulate")
      .send({ numbers: [1, 2, 3, 4, 5, 6], maxDraws: "10" })
      .expect(400);

    expect(res.body.details.violations).toContain("maxDraws must be an integer number");
  });

  it("echoes the trace id header", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/draw")
      .set("x-trace-id", "trace-test")
      .send({ numbers: [1, 2, 3, 4, 5, 6] })
      .expect(201);

    expect(res.headers["x-trace-id"]).toBe("trace-test");
    expect(logger.entries).toContainEqual(
      expect.objectContaining({ msg: "request.completed", meta: expect.objectContaining({ traceId: "trace-test" }) }),
    );
  });

  it("reports a healthy rng", async () => {
    const res = await request(app.getHttpServer()).get("/toto/health").expect(200);
    expect(res.body).toEqual({ status: "ok", checks: { rng: { ok: true } } });
  });

  it("exposes draw counters on /metrics", async () => {
    await request(app.getHttpServer()).post("/toto/draw").send({ numbers: [1, 2, 3, 4, 5, 6] }).expect(201);

    const res = await request(app.getHttpServer()).get("/metrics").expect(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain/);
    expect(res.text).toMatch(/toto_draws_total\{[^}]*tier="JACKPOT"[^}]*\} \d+/);
    expect(await registry.metrics()).toContain("toto_simulations_total");
  });
});

describe("TOTO API provably-fair draws", () => {
  const provablyFair = new ProvablyFairService();
  let app: INestApplication;

  beforeAll(async () => {
    ({ app } = await createTotoTestHarness());
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it("reveals seeds that replay the returned draw", async () => {
    const res = await request(app.getHttpServer())
      .post("/toto/draw")
      .send({ numbers: [1, 2, 3, 4, 5, 6], clientSeed: "test-client" })
      .expect(201);

    const { serverSeed, serverSeedHash, clientSeed, nonce, winningNumbers, supplementary } = res.body;
    expect(provablyFair.hashServerSeed(serverSeed)).toBe(serverSeedHash);
    expect(clientSeed).toBe("test-client");
    expect(
      verifyDraw(provablyFair, {
        serverSeed,
        clientSeed,
        nonce,
        draw: { primaryNumbers: winningNumbers, supplementary },
      }),
    ).toBe(true);
  });

  it("reveals a fresh server seed per request", async () => {
    const send = () => request(app.getHttpServer()).post("/toto/simulate").send({ numbers: [1, 2, 3, 4, 5, 6], maxDraws: 5 }).expect(201);

    const [first, second] = [await send(), await send()];
    expect(first.body.serverSeed).toMatch(/^[0-9a-f]{64}$/);
    expect(first.body.serverSeed).not.toBe(second.body.serverSeed);
  });
});
