// Re-export MST types for consumers
export { types, type Instance, type SnapshotIn } from "mobx-state-tree";

/**
 * HealthSim: synthetic healthcare data.
 *
 *  1) PatientSim: clinical patients with diagnoses, encounters, medications and
 *     observations; FHIR R4 bundles and HL7 v2 ADT/ORM/ORU messages
 *  2) MemberSim: health plan members, families and adjudicated professional
 *     claims; X12 834/837P/835/270/271/278
 *  3) RxMemberSim: pharmacy members, formularies, DUR, prior authorization and
 *     B1/B2/B3 claim adjudication; NCPDP Telecom, SCRIPT and ePA
 *  4) A pharmacy session (mobx-state-tree) with lifecycle hooks, served over
 *     HTTP (hono) and MCP.
 */

export * from "./src/config";
export * from "./src/errors";
export * from "./src/logger";
export * from "./src/random";
export * from "./src/dates";
export * from "./src/data/identifiers";
export * from "./src/data/demographics";
export type * from "./src/data/loaders/reference";

export * from "./src/patientsim/models";
export * from "./src/patientsim/generator";

export * from "./src/membersim/models";
export * from "./src/membersim/plans";
export * from "./src/membersim/claims";
export * from "./src/membersim/generator";

export * from "./src/rxmembersim/member";
export * from "./src/rxmembersim/formulary";
export * from "./src/rxmembersim/dur";
export * from "./src/rxmembersim/priorAuth";
export * from "./src/rxmembersim/claim";
export * from "./src/rxmembersim/adjudication";

export * as fhir from "./src/formats/fhir";
export * as hl7v2 from "./src/formats/hl7v2";
export * as x12 from "./src/formats/x12";
export * as ncpdp from "./src/formats/ncpdp";
export * as script from "./src/formats/script";

export * from "./src/session";
export * from "./src/storage";
export * from "./src/operations";
export { createApp, startServer, type AppDependencies } from "./src/server";
export { createMcpServer, handleToolCall, TOOLS, type ToolResult } from "./src/mcp";
