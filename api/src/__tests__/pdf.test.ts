import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import { renderPlanPdf } from "../pdf.js";
import { buildSchedules } from "../scheduler.js";

function render(weeks: ReturnType<typeof buildSchedules>): Promise<Buffer> {
  const out = new PassThrough();
  const chunks: Buffer[] = [];
  out.on("data", (chunk: Buffer) => chunks.push(chunk));
  return new Promise((resolve, reject) => {
    out.on("end", () => resolve(Buffer.concat(chunks)));
    out.on("error", reject);
    renderPlanPdf(weeks, out);
  });
}

const pageCount = (pdf: Buffer) => pdf.toString("latin1").match(/\/Type \/Page(?!s)/g)?.length ?? 0;

describe("renderPlanPdf", () => {
  it("writes a complete PDF document", async () => {
    const pdf = await render(buildSchedules({ today: new Date("2026-06-15T08:00:00Z") }));
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pdf.toString("latin1").trimEnd().endsWith("%%EOF")).toBe(true);
    expect(pageCount(pdf)).toBe(1);
  });

  it("continues the table on new pages", async () => {
    const pdf = await render(buildSchedules({ today: new Date("2025-09-17T10:00:00Z") }));
    expect(pageCount(pdf)).toBe(3);
  });
});
