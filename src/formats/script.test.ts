import { describe, it, expect } from "vitest";
import type { PriorAuthDecision, PriorAuthRequest } from "../rxmembersim/priorAuth";
import { escapeXml, toNewRx, toPaResponse, type NewRxMessage } from "./script";

const newRx: NewRxMessage = {
  messageId: "MSG-1",
  sentTime: "2024-06-01T10:00:00Z",
  patient: { firstName: "Sean", lastName: "O'Brien", dateOfBirth: "1980-05-05", gender: "M" },
  prescriber: { npi: "1234567893", lastName: "Example" },
  pharmacy: { npi: "1992753880", name: "Test & Sons Pharmacy" },
  medication: {
    ndc: "00093017101",
    drugName: "Metformin 500mg",
    quantity: 60,
    daysSupply: 30,
    refills: 3,
    sig: "Take 1 tablet by mouth twice daily",
    writtenDate: "2024-06-01",
  },
};

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a & 'b' "c">`)).toBe("&lt;a &amp; &apos;b&apos; &quot;c&quot;&gt;");
  });
});

describe("toNewRx", () => {
  const xml = toNewRx(newRx);

  it("writes an indented document with a routing header", () => {
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<Message>\n  <Header>\n    <To>1992753880</To>\n    <From>1234567893</From>\n')).toBe(true);
    expect(xml.endsWith("</Message>\n")).toBe(true);
  });

  it("escapes names and defaults substitutions", () => {
    expect(xml).toContain("<LastName>O&apos;Brien</LastName>");
    expect(xml).toContain("<StoreName>Test &amp; Sons Pharmacy</StoreName>");
    expect(xml).toContain("<Substitutions>0</Substitutions>");
    expect(xml).toContain("<ProductCodeQualifier>ND</ProductCodeQualifier>");
    expect(xml).toContain("<Value>60</Value>");
  });

  it("drops elements that have no value", () => {
    expect(xml).not.toContain("<MemberID>");
    expect(xml).not.toContain("<Diagnosis>");
    expect(xml).not.toContain("<Specialty>");
    const withDiagnosis = toNewRx({ ...newRx, medication: { ...newRx.medication, diagnosis: "E11.9" } });
    expect(withDiagnosis).toContain("<Diagnosis>\n");
    expect(withDiagnosis).toContain("<Code>E11.9</Code>");
  });
});

describe("toPaResponse", () => {
  const request: PriorAuthRequest = {
    requestId: "PA-TEST-1",
    memberId: "RXM000000001",
    ndc: "00169413512",
    diagnoses: ["E11.9"],
    prescriberNpi: "1234567893",
    requestDate: "2024-06-01",
  };
  const base = {
    requestId: "PA-TEST-1",
    memberId: "RXM000000001",
    ndc: "00169413512",
    drugName: "Ozempic 0.5mg",
    criteriaMet: [],
  };

  it("returns the approval window", () => {
    const decision: PriorAuthDecision = {
      ...base,
      status: "approved",
      authorizationNumber: "PA20240601000123",
      effectiveDate: "2024-06-01",
      expirationDate: "2025-06-01",
      criteriaFailed: [],
      message: "Approved for 365 days",
    };
    const xml = toPaResponse(decision, request);
    expect(xml).toContain("<MessageID>PAR-PA-TEST-1</MessageID>");
    expect(xml).toContain("<RelatesToMessageID>PA-TEST-1</RelatesToMessageID>");
    expect(xml).toContain("<PAReferenceID>PA20240601000123</PAReferenceID>");
    expect(xml).toContain("<ExpirationDate>2025-06-01</ExpirationDate>");
    expect(xml).toContain("<PrescriberNPI>1234567893</PrescriberNPI>");
  });

  it("lists each denial reason", () => {
    const decision: PriorAuthDecision = {
      ...base,
      status: "denied",
      criteriaFailed: ["HbA1c within 90 days not documented", "Trial of metformin for at least 90 days not documented"],
      message: "Denied",
    };
    const xml = toPaResponse(decision, request);
    expect(xml).toContain("<DenialReason>HbA1c within 90 days not documented</DenialReason>");
    expect(xml).toContain("<DenialReason>Trial of metformin for at least 90 days not documented</DenialReason>");
    expect(xml).not.toContain("<Approved>");
  });

  it("closes requests that need no review", () => {
    const decision: PriorAuthDecision = {
      ...base,
      status: "not_required",
      criteriaFailed: [],
      message: "Ozempic 0.5mg does not require prior authorization",
    };
    expect(toPaResponse(decision, request)).toContain(
      "<CloseReason>Ozempic 0.5mg does not require prior authorization</CloseReason>",
    );
  });
});
