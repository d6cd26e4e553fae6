import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { parseArgs, runCli, USAGE, type CliIo } from "./cli";

function capture(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (t) => out.push(t), stderr: (t) => err.push(t) };
}

describe("parseArgs", () => {
  it("separates the command, positionals and flags", () => {
    expect(parseArgs(["x12", "834", "--count", "2", "--control-number=9", "--with-claims", "--age", "20-40"])).toEqual({
      command: "x12",
      positionals: ["834"],
      flags: { count: "2", controlNumber: "9", withClaims: "true", ageRange: "20-40" },
    });
  });

  it("maps short flag names to parameter names", () => {
    expect(parseArgs(["formulary", "00093017101", "--formulary", "MEDICARE-PART-D", "--plan", "HDHP-HSA"]).flags).toEqual({
      formularyId: "MEDICARE-PART-D",
      planCode: "HDHP-HSA",
    });
  });

  it("keeps everything after the first equals sign in an inline value", () => {
    expect(parseArgs(["serve", "--out=a=b", "--filter=="]).flags).toEqual({ out: "a=b", filter: "=" });
  });
});

describe("entry point", () => {
  it("runs its TypeScript source through tsx", () => {
    const [shebang] = readFileSync(new URL("./cli.ts", import.meta.url), "utf8").split("\n");
    expect(shebang).toBe("#!/usr/bin/env -S npx tsx");
  });
});

describe("runCli", () => {
  it("prints usage without a command", async () => {
    const io = capture();
    expect(await runCli([], io)).toBe(1);
    expect(io.out).toEqual([USAGE]);
    expect(await runCli(["help"], io)).toBe(0);
  });

  it("reports unknown commands and missing arguments", async () => {
    const io = capture();
    expect(await runCli(["bogus"], io)).toBe(1);
    expect(io.err).toEqual([`Unknown command: bogus\n\n${USAGE}`]);
    expect(await runCli(["formulary"], io)).toBe(1);
    expect(io.err[1]).toBe(`formulary needs an NDC\n\n${USAGE}`);
  });

  it("prints JSON results", async () => {
    const io = capture();
    expect(await runCli(["formulary", "00093017101"], io)).toBe(0);
    expect(JSON.parse(io.out[0])).toMatchObject({ covered: true, drugName: "Metformin 500mg" });
    expect(io.out[0].endsWith("}\n")).toBe(true);
  });

  it("prints HL7 and X12 as text", async () => {
    const io = capture();
    await runCli(["patients", "--format", "hl7", "--seed", "1"], io);
    expect(io.out[0].startsWith("MSH|")).toBe(true);
    await runCli(["x12", "834", "--seed", "1", "--control-number", "3"], io);
    expect(io.out[1]).toContain("IEA*1*000000003~\n");
  });

  it("reports operation errors", async () => {
    const io = capture();
    expect(await runCli(["patients", "--format", "xml"], io)).toBe(1);
    expect(io.err).toEqual(["Error: format must be one of: json, fhir, hl7\n"]);
  });
});
