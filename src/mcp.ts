import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import {
  adjudicatePharmacyClaim,
  checkFormulary,
  createRxMember,
  evaluatePriorAuth,
  exportX12,
  generateMembers,
  generatePatients,
  PATIENT_FORMATS,
  screenDur,
  X12_EXPORTS,
} from "./operations";
import { asParams, optionalString, requireString } from "./params";
import { createPharmacySession, type PharmacySessionInstance } from "./session";

const log = createLogger("mcp");

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, object>;
    required?: string[];
  };
};

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

const seed = { type: "number", description: "Seed for reproducible output" };
const range = (description: string) => ({ type: "array", items: { type: "number" }, minItems: 2, maxItems: 2, description });
const medicationList = (description: string) => ({
  type: "array",
  items: { type: "object", properties: { ndc: { type: "string" }, gpi: { type: "string" }, name: { type: "string" } } },
  description,
});

export const TOOLS: ToolDefinition[] = [
  {
    name: "generate_patients",
    description: "Generate synthetic clinical patients as JSON, a FHIR R4 bundle, or HL7 v2 messages.",
    inputSchema: {
      type: "object",
      properties: {
        count: { type: "number", description: "Number of patients (default 1)" },
        scenario: { type: "string", description: "Clinical scenario id, e.g. diabetes or cardiac" },
        conditions: { type: "array", items: { type: "string" }, description: "Condition keys to include" },
        ageRange: range("[min, max] age in years"),
        gender: { type: "string", enum: ["M", "F"] },
        format: { type: "string", enum: [...PATIENT_FORMATS] },
        seed,
      },
    },
  },
  {
    name: "generate_members",
    description: "Generate health plan members with coverage, accumulators and optionally adjudicated claims.",
    inputSchema: {
      type: "object",
      properties: {
        count: { type: "number" },
        planCode: { type: "string", description: "Plan code, e.g. PPO-GOLD or HDHP-HSA" },
        withClaims: { type: "boolean" },
        family: { type: "boolean", description: "Generate one subscriber family instead of independent members" },
        seed,
      },
    },
  },
  {
    name: "check_formulary",
    description: "Look up formulary coverage, tier and utilization management flags for an NDC.",
    inputSchema: {
      type: "object",
      properties: {
        ndc: { type: "string", description: "11-digit NDC, hyphens allowed" },
        formularyId: { type: "string", enum: ["STD-COMMERCIAL", "MEDICARE-PART-D"] },
      },
      required: ["ndc"],
    },
  },
  {
    name: "screen_dur",
    description: "Run drug utilization review for a prescription against current medications and patient factors.",
    inputSchema: {
      type: "object",
      properties: {
        ndc: { type: "string" },
        patientAge: { type: "number" },
        patientGender: { type: "string", enum: ["M", "F"] },
        currentMedications: medicationList("Medications the patient is taking"),
        priorFills: {
          type: "array",
          items: {
            type: "object",
            properties: { ndc: { type: "string" }, fillDate: { type: "string" }, daysSupply: { type: "number" } },
          },
        },
        quantity: { type: "number" },
        daysSupply: { type: "number" },
        serviceDate: { type: "string", description: "YYYY-MM-DD" },
      },
      required: ["ndc", "patientGender"],
    },
  },
  {
    name: "evaluate_prior_auth",
    description: "Evaluate a prior authorization request against the drug's clinical criteria.",
    inputSchema: {
      type: "object",
      properties: {
        memberId: { type: "string" },
        ndc: { type: "string" },
        diagnoses: { type: "array", items: { type: "string" }, description: "ICD-10 codes" },
        labResults: {
          type: "array",
          items: {
            type: "object",
            properties: { loinc: { type: "string" }, value: { type: "number" }, date: { type: "string" } },
          },
        },
        medicationHistory: {
          type: "array",
          items: {
            type: "object",
            properties: {
              ndc: { type: "string" },
              gpi: { type: "string" },
              name: { type: "string" },
              startDate: { type: "string" },
              endDate: { type: "string" },
              daysSupply: { type: "number" },
            },
          },
        },
        prescriberSpecialty: { type: "string" },
        requestDate: { type: "string" },
        includeEpa: { type: "boolean", description: "Also return the ePA PAResponse XML" },
      },
      required: ["memberId", "ndc"],
    },
  },
  {
    name: "adjudicate_pharmacy_claim",
    description:
      "Adjudicate a B1/B2/B3 pharmacy claim. Without memberId a new pharmacy member is generated and registered first.",
    inputSchema: {
      type: "object",
      properties: {
        memberId: { type: "string" },
        transactionCode: { type: "string", enum: ["B1", "B2", "B3"] },
        ndc: { type: "string" },
        prescriptionNumber: { type: "string" },
        fillNumber: { type: "number" },
        quantityDispensed: { type: "number" },
        daysSupply: { type: "number" },
        serviceDate: { type: "string" },
        ingredientCostSubmitted: { type: "number" },
        dispensingFeeSubmitted: { type: "number" },
        usualCustomaryCharge: { type: "number" },
        encoding: { type: "string", enum: ["ncpdp"], description: "Also return NCPDP Telecom encodings" },
      },
      required: ["ndc", "prescriptionNumber", "quantityDispensed", "daysSupply"],
    },
  },
  {
    name: "export_x12",
    description: "Generate members or claims and export them as an X12 005010 interchange.",
    inputSchema: {
      type: "object",
      properties: {
        transaction: { type: "string", enum: [...X12_EXPORTS] },
        count: { type: "number" },
        planCode: { type: "string" },
        includeBenefits: { type: "boolean" },
        controlNumber: { type: "number" },
        seed,
      },
      required: ["transaction"],
    },
  },
];

const text = (value: string): ToolResult => ({ content: [{ type: "text", text: value }] });
const json = (value: unknown): ToolResult => text(JSON.stringify(value, null, 2));

function runTool(session: PharmacySessionInstance, name: string, args: unknown): ToolResult {
  const p = asParams(args, "arguments");
  switch (name) {
    case "generate_patients": {
      const result = generatePatients(p);
      return result.format === "hl7" ? text(result.messages.join("\n\n")) : json(result);
    }
    case "generate_members":
      return json(generateMembers(p));
    case "check_formulary":
      return json(checkFormulary(requireString(p, "ndc"), p, session));
    case "screen_dur":
      return json(screenDur(p, session));
    case "evaluate_prior_auth":
      return json(evaluatePriorAuth(session, p));
    case "adjudicate_pharmacy_claim": {
      const memberId = optionalString(p, "memberId") ?? createRxMember(session, p).memberId;
      return json(adjudicatePharmacyClaim(session, { ...p, memberId }));
    }
    case "export_x12":
      return text(exportX12(requireString(p, "transaction"), p).content);
    default:
      return { ...text(`Unknown tool: ${name}`), isError: true };
  }
}

/** Runs a tool; failures come back as an error result rather than a protocol error. */
export function handleToolCall(session: PharmacySessionInstance, name: string, args: unknown): ToolResult {
  try {
    return runTool(session, name, args);
  } catch (e) {
    log.warn(`${name} failed: ${errorMessage(e)}`);
    return { ...text(errorMessage(e)), isError: true };
  }
}

export function createMcpServer(session: PharmacySessionInstance = createPharmacySession()): Server {
  const server = new Server({ name: "healthsim", version: "0.1.0" }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(session, request.params.name, request.params.arguments ?? {}),
  );

  return server;
}

export async function startMcpServer(session?: PharmacySessionInstance): Promise<void> {
  const server = createMcpServer(session);
  await server.connect(new StdioServerTransport());
  log.info(`MCP server ready on stdio with ${TOOLS.length} tools`);
}
