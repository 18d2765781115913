import { Server } from "http";
import { SilentLogger } from "@loanrent/shared-utils";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "../src";

const envelope = z.object({
  success: z.boolean(),
  data: z.any(),
  error: z.string().optional(),
  details: z.any(),
  timestamp: z.string(),
});

async function readJson(res: Response) {
  return envelope.parse(await res.json());
}

describe("Amortization HTTP API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({ logger: new SilentLogger(), corsOrigins: ["*"] });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("should report health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    const json = await readJson(res);

    expect(res.status).toBe(200);
    expect(json.success).toBe(true);
    expect(json.data).toEqual({ status: "healthy", service: "amortization" });
  });

  it("should serve default inputs", async () => {
    const res = await fetch(`${baseUrl}/defaults`);
    const json = await readJson(res);

    expect(json.data.propertyValue).toBe(22_000_000);
    expect(json.data.vacancyMonthsPerYear).toBe(1);
    expect(json.data.rentMode).toBe("monthly");
  });

  it("should compute the installment", async () => {
    const res = await post("/emi", { principal: 19_800_000, annualRatePercent: 7.4, years: 20 });
    const json = await readJson(res);

    expect(res.status).toBe(200);
    expect(json.data.emi).toBeCloseTo(158298.94, 2);
  });

  it("should reject a zero rate as an invalid parameter", async () => {
    const res = await post("/emi", { principal: 100_000, annualRatePercent: 0, years: 20 });
    const json = await readJson(res);

    expect(res.status).toBe(422);
    expect(json.success).toBe(false);
    expect(json.details).toEqual({ code: "INVALID_PARAMETER", parameter: "annualRatePercent" });
  });

  it("should build the default schedule from an empty body", async () => {
    const res = await post("/schedule", {});
    const json = await readJson(res);

    expect(res.status).toBe(200);
    expect(json.data.downPayment).toBe(2_200_000);
    expect(json.data.loanAmount).toBe(19_800_000);
    expect(json.data.rows).toHaveLength(240);
    expect(json.data.rows[11].rentReceived).toBe(0);
    expect(json.data.rows[11].cashflowPositive).toBe(false);
    expect(json.data.rows[12].rentReceived).toBe(78750);
    expect(json.data.summary.breakEvenYear).toBe(19);
    expect(json.data.summaryLines[0]).toBe("Monthly EMI (Fixed): ₹ 158,299");
  });

  it("should apply overrides and yield mode", async () => {
    const res = await post("/schedule", {
      tenureYears: 5,
      rentMode: "yield",
      rentalYieldPercent: 6,
      vacancyMonthsPerYear: 0,
    });
    const json = await readJson(res);

    expect(res.status).toBe(200);
    expect(json.data.rows).toHaveLength(60);
    expect(json.data.rows[0].rentReceived).toBe(110000);
  });

  it("should reject inputs outside the accepted bounds", async () => {
    const res = await post("/schedule", { tenureYears: 40, vacancyMonthsPerYear: 1.5 });
    const json = await readJson(res);

    expect(res.status).toBe(400);
    expect(json.error).toBe("Validation error");
    const paths = json.details.errors.map((e: { path: string }) => e.path);
    expect(paths).toEqual(["tenureYears", "vacancyMonthsPerYear"]);
  });

  it("should return one year with its averages", async () => {
    const res = await post("/schedule/year", { year: 2 });
    const json = await readJson(res);

    expect(res.status).toBe(200);
    expect(json.data.year).toBe(2);
    expect(json.data.rows).toHaveLength(12);
    expect(json.data.rows[0].month).toBe(13);
    expect(json.data.averages.averageMonthlyRent).toBe(72187.5);
    expect(json.data.averages.averageOutOfPocket).toBeCloseTo(86111.44, 2);
  });

  it("should reject a year beyond the tenure", async () => {
    const res = await post("/schedule/year", { year: 21 });
    const json = await readJson(res);

    expect(res.status).toBe(422);
    expect(json.details.parameter).toBe("year");
  });

  it("should export the schedule as a CSV attachment", async () => {
    const res = await post("/schedule/export", { tenureYears: 5 });
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("content-disposition")).toBe(
      'attachment; filename="loan_rent_amortization.csv"'
    );
    expect(text.split("\n")).toHaveLength(62);
  });

  it("should reject malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/schedule`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json",
    });
    const json = await readJson(res);

    expect(res.status).toBe(400);
    expect(json.error).toBe("Malformed JSON body");
  });

  it("should reject a body over the size limit", async () => {
    const res = await post("/schedule", { propertyValue: 1, note: "x".repeat(70_000) });
    const json = await readJson(res);

    expect(res.status).toBe(413);
    expect(json.success).toBe(false);
    expect(json.error).toBe("request entity too large");
  });

  it("should return 404 for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    const json = await readJson(res);

    expect(res.status).toBe(404);
    expect(json.error).toBe("Route GET /nope not found");
  });
});
