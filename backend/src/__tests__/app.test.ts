import request from "supertest";
import { createApp } from "../app";

describe("createApp", () => {
    const app = createApp();

    it("reports health with the engine configuration", async () => {
        const res = await request(app).get("/api/health");

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            status: "ok",
            uptimeSeconds: expect.any(Number),
            mixMode: "intelligent",
            enhancedScoring: true,
            policies: 3,
        });
    });

    it("sets security headers", async () => {
        const res = await request(app).get("/api/health");

        expect(res.headers["x-content-type-options"]).toBe("nosniff");
        expect(res.headers["cross-origin-resource-policy"]).toBe("cross-origin");
    });

    it("mounts the mixing routers", async () => {
        const res = await request(app)
            .post("/api/compatibility/score")
            .send({
                trackA: { id: "a", key: "8A", bpm: 125, energy: 5 },
                trackB: { id: "b", key: "8A", bpm: 125, energy: 5 },
            });

        expect(res.status).toBe(200);
        expect(res.body.score).toBeCloseTo(0.9);
        expect(res.headers["ratelimit-limit"]).toBe("600");
    });

    it("routes domain errors through the error handler", async () => {
        const res = await request(app)
            .post("/api/policies/missing/apply")
            .send({ tracks: [] });

        expect(res.status).toBe(404);
        expect(res.body).toEqual({
            error: "Policy 'missing' not found",
            code: "POLICY_NOT_FOUND",
            category: "RECOVERABLE",
        });
    });
});
