import { beforeEach, describe, it, expect } from "vitest";
import { InvalidRequestError, NotFoundError } from "./errors";
import { parseX12, validateEnvelope } from "./formats/x12";
import {
  adjudicatePharmacyClaim,
  buildPharmacyClaim,
  checkFormulary,
  createRxMember,
  evaluatePriorAuth,
  exportX12,
  generateMembers,
  generatePatients,
  getRxMember,
  listPlans,
  listScenarios,
  saveSession,
  screenDur,
} from "./operations";
import type { RxMember } from "./rxmembersim/member";
import { createPharmacySession, type PharmacySessionInstance } from "./session";
import { createOutputStore, loadSessionSnapshot } from "./storage";

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

const metforminClaim = {
  memberId: member.memberId,
  ndc: "00093017101",
  prescriptionNumber: "RX1",
  quantityDispensed: 60,
  daysSupply: 30,
  serviceDate: "2024-03-01",
  ingredientCostSubmitted: 12.5,
  dispensingFeeSubmitted: 2,
  usualCustomaryCharge: 20,
};

let session: PharmacySessionInstance;

beforeEach(() => {
  session = createPharmacySession({ id: "ops" });
});

describe("reference lists", () => {
  it("lists scenarios and plans", () => {
    expect(listScenarios().map((s) => s.id)).toContain("diabetes");
    expect(listPlans().map((p) => p.code)).toEqual(["PPO-GOLD", "PPO-SILVER", "HMO-BASIC", "EPO-STANDARD", "HDHP-HSA"]);
  });
});

describe("generatePatients", () => {
  const input = { count: 2, seed: 42, referenceDate: "2024-06-01" };

  it("is reproducible for a seed", () => {
    const first = generatePatients(input);
    const second = generatePatients(input);
    expect(first).toEqual(second);
    expect(first).toMatchObject({ format: "json", seed: 42, count: 2 });
  });

  it("renders FHIR and HL7", () => {
    const fhir = generatePatients({ ...input, format: "fhir" });
    expect(fhir.format === "fhir" && fhir.bundle.resourceType).toBe("Bundle");
    const hl7 = generatePatients({ ...input, format: "hl7" });
    expect(hl7.format === "hl7" && hl7.messages.length).toBe(4);
  });

  it("validates its parameters", () => {
    expect(() => generatePatients({ format: "xml" })).toThrow("format must be one of: json, fhir, hl7");
    expect(() => generatePatients({ referenceDate: "June" })).toThrow("referenceDate must be a YYYY-MM-DD date");
  });
});

describe("generateMembers", () => {
  it("builds a population or a family", () => {
    expect(generateMembers({ count: 3, seed: 7 }).members).toHaveLength(3);
    const family = generateMembers({ family: true, spouse: true, children: 2, seed: 7 }).members;
    expect(family.map((m) => m.relationship)).toEqual(["self", "spouse", "child", "child"]);
    expect(new Set(family.map((m) => m.subscriberId)).size).toBe(1);
  });
});

describe("exportX12", () => {
  it("writes well formed interchanges", () => {
    for (const tx of ["834", "837P", "270", "271"]) {
      const { content } = exportX12(tx, { seed: 11, count: 2, controlNumber: 5 });
      expect(validateEnvelope(parseX12(content))).toEqual([]);
    }
  });

  it("rejects unknown transactions", () => {
    expect(() => exportX12("999", {})).toThrow(NotFoundError);
    expect(() => exportX12("999", {})).toThrow("Unknown X12 transaction 999. Available: 834, 837p, 835, 270, 271");
  });
});

describe("checkFormulary", () => {
  it("normalizes hyphenated NDCs", () => {
    expect(checkFormulary("00093-0171-01")).toMatchObject({
      ndc: "00093017101",
      covered: true,
      drugName: "Metformin 500mg",
      tier: 1,
      requiresPa: false,
    });
  });

  it("reports drugs that are not listed", () => {
    expect(checkFormulary("12345678901").covered).toBe(false);
  });
});

describe("screenDur", () => {
  it("screens against medications given by GPI", () => {
    const result = screenDur({
      ndc: "00056017270",
      patientAge: 60,
      patientGender: "F",
      currentMedications: [{ gpi: "66100010000310", name: "Ibuprofen 800mg" }],
    });
    expect(result.hasRejectingAlert).toBe(true);
    expect(result.alerts[0].alertType).toBe("DD");
  });

  it("needs an age and a gender", () => {
    expect(() => screenDur({ ndc: "00056017270", patientGender: "F" })).toThrow("patientAge or dateOfBirth is required");
    expect(() => screenDur({ ndc: "00056017270", patientAge: 60 })).toThrow("patientGender is required");
  });

  it("reports unknown NDCs as not found", () => {
    expect(() => screenDur({ ndc: "12345678901", patientAge: 60, patientGender: "F" })).toThrow(
      "NDC 12345678901 is not on formulary STD-COMMERCIAL",
    );
  });
});

describe("evaluatePriorAuth", () => {
  it("records the decision and returns ePA XML on request", () => {
    const result = evaluatePriorAuth(session, {
      requestId: "PA-OPS-1",
      memberId: member.memberId,
      ndc: "00169413512",
      diagnoses: ["E11.65"],
      labResults: [{ loinc: "4548-4", value: 8.1, date: "2024-05-01" }],
      medicationHistory: [{ gpi: "27250050000310", name: "Metformin", startDate: "2023-10-01", endDate: "2024-04-01" }],
      requestDate: "2024-06-01",
      includeEpa: true,
    });
    expect(result.decision.status).toBe("approved");
    expect(result.paResponse).toContain("<MessageID>PAR-PA-OPS-1</MessageID>");
    expect(session.priorAuthorizations).toHaveLength(1);
  });

  it("requires a start date on medication history", () => {
    expect(() =>
      evaluatePriorAuth(session, {
        memberId: member.memberId,
        ndc: "00169413512",
        medicationHistory: [{ gpi: "27250050000310" }],
      }),
    ).toThrow("medicationHistory[].startDate is required");
  });
});

describe("pharmacy members and claims", () => {
  it("generates and registers members", () => {
    const created = createRxMember(session, { seed: 3, bin: "004336" });
    expect(created.bin).toBe("004336");
    expect(getRxMember(session, created.memberId)).toEqual(created);
    expect(() => getRxMember(session, "RXM999999999")).toThrow("Member RXM999999999 not found");
  });

  it("fills claim fields from the member card", () => {
    session.registerMember(member);
    const claim = buildPharmacyClaim(session, metforminClaim);
    expect(claim).toMatchObject({
      claimId: "RXC00000001",
      transactionCode: "B1",
      cardholderId: "ZX000000001",
      bin: "610014",
      pcn: "HSIMRX",
      fillNumber: 0,
      grossAmountDue: 14.5,
    });
    expect(() => buildPharmacyClaim(session, { ...metforminClaim, prescriptionNumber: undefined })).toThrow(
      InvalidRequestError,
    );
    expect(() => buildPharmacyClaim(session, { ...metforminClaim, transactionCode: "B9" })).toThrow(
      "transactionCode must be one of: B1, B2, B3",
    );
  });

  it("adjudicates and encodes a claim", () => {
    session.registerMember(member);
    const result = adjudicatePharmacyClaim(session, { ...metforminClaim, encoding: "ncpdp" });
    expect(result.transaction).toBe("Billing");
    expect(result.response).toMatchObject({ status: "P", patientPay: 10, planPaid: 4.5 });
    expect(result.ncpdp?.request.startsWith("610014D0B1HSIMRX")).toBe(true);
    expect(result.ncpdp?.response.startsWith("D0B11A01")).toBe(true);
    expect(session.claims).toHaveLength(1);
  });
});

describe("saveSession", () => {
  it("stores the session under its id", async () => {
    const store = createOutputStore({ driver: "memory" });
    session.registerMember(member);
    expect(await saveSession(session, store)).toEqual({ key: "sessions:ops" });
    expect((await loadSessionSnapshot(store, "ops")).members.size).toBe(1);
  });
});
