import { describe, it, expect } from "vitest";
import { HealthSimError, NotFoundError } from "./errors";
import type { PharmacyClaim } from "./rxmembersim/claim";
import type { RxMember } from "./rxmembersim/member";
import { createPharmacySession } from "./session";
import {
  createOutputStore,
  listOutputs,
  loadOutput,
  loadSessionSnapshot,
  saveOutput,
  saveSessionSnapshot,
  sessionKey,
} from "./storage";

const member: RxMember = {
  memberId: "RXM000000001",
  cardholderId: "ZX000000001",
  personCode: "01",
  bin: "610014",
  pcn: "HSIMRX",
  groupNumber: "RXGROUP01",
  firstName: "Ada",
  lastName: "Example",
  dateOfBirth: "1970-04-12",
  gender: "F",
  deductibleMet: 0,
  deductibleLimit: 250,
  oopMet: 100,
  oopLimit: 2000,
};

function claim(claimId: string, prescriptionNumber: string): PharmacyClaim {
  return {
    claimId,
    transactionCode: "B1",
    serviceDate: "2024-03-01",
    pharmacyNpi: "1234567893",
    memberId: member.memberId,
    cardholderId: member.cardholderId,
    personCode: "01",
    bin: "610014",
    pcn: "HSIMRX",
    groupNumber: "RXGROUP01",
    prescriptionNumber,
    fillNumber: 0,
    ndc: "00093017101",
    quantityDispensed: 60,
    daysSupply: 30,
    dawCode: "0",
    prescriberNpi: "1234567893",
    ingredientCostSubmitted: 12.5,
    dispensingFeeSubmitted: 2,
    patientPaidSubmitted: 0,
    usualCustomaryCharge: 20,
    grossAmountDue: 14.5,
  };
}

describe("output store", () => {
  it("round-trips text and JSON", async () => {
    const store = createOutputStore({ driver: "memory" });
    await saveOutput(store, "x12:834.edi", "ISA*00~");
    await saveOutput(store, "patients:batch.json", { count: 2 });
    expect(await loadOutput(store, "x12:834.edi")).toBe("ISA*00~");
    expect(await loadOutput(store, "patients:batch.json")).toEqual({ count: 2 });
    expect(await loadOutput(store, "missing")).toBeNull();
    expect(await listOutputs(store, "x12")).toEqual(["x12:834.edi"]);
  });
});

describe("session snapshots", () => {
  it("saves and restores a session", async () => {
    const store = createOutputStore({ driver: "memory" });
    const session = createPharmacySession({ id: "pbm-1" });
    session.registerMember(member);

    expect(await saveSessionSnapshot(store, session)).toBe("sessions:pbm-1");
    const restored = await loadSessionSnapshot(store, "pbm-1");
    expect(restored.id).toBe("pbm-1");
    expect(restored.getMember(member.memberId)).toEqual(member);
  });

  it("continues authorization numbers after a restore", async () => {
    const store = createOutputStore({ driver: "memory" });
    const session = createPharmacySession({ id: "pbm-2" });
    session.registerMember(member);
    expect(session.submitClaim(claim("RXC1", "RX1")).authorizationNumber).toBe("240301000001");
    await saveSessionSnapshot(store, session);

    const restored = await loadSessionSnapshot(store, "pbm-2");
    expect(restored.submitClaim(claim("RXC2", "RX2")).authorizationNumber).toBe("240301000002");
  });

  it("reports missing and corrupt sessions", async () => {
    const store = createOutputStore({ driver: "memory" });
    await expect(loadSessionSnapshot(store, "nope")).rejects.toThrow(NotFoundError);
    await store.setItem(sessionKey("bad"), { members: "not a map" });
    await expect(loadSessionSnapshot(store, "bad")).rejects.toThrow(HealthSimError);
    await expect(loadSessionSnapshot(store, "bad")).rejects.toThrow("Stored session bad is not a valid snapshot");
  });
});
