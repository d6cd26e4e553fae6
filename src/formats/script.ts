/**
 * NCPDP SCRIPT-style NewRx and ePA PAResponse XML.
 */

import type { Gender } from "../data/loaders/reference";
import type { PriorAuthDecision, PriorAuthRequest } from "../rxmembersim/priorAuth";

export interface NewRxMessage {
  messageId: string;
  sentTime: string;
  from?: string;
  to?: string;
  patient: {
    memberId?: string;
    firstName: string;
    lastName: string;
    dateOfBirth: string;
    gender: Gender;
  };
  prescriber: {
    npi: string;
    firstName?: string;
    lastName: string;
    specialty?: string;
  };
  pharmacy: {
    npi: string;
    name: string;
  };
  medication: {
    ndc: string;
    drugName: string;
    quantity: number;
    daysSupply: number;
    refills: number;
    sig: string;
    substitutions?: string;
    writtenDate: string;
    diagnosis?: string;
  };
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** An element is either a text leaf or a list of children; undefined leaves are dropped. */
type Node = [name: string, content: string | number | undefined | Node[]];

function render(node: Node, depth: number): string {
  const [name, content] = node;
  const indent = "  ".repeat(depth);
  if (Array.isArray(content)) {
    const inner = content.map((child) => render(child, depth + 1)).filter((s) => s.length > 0);
    if (inner.length === 0) return "";
    return `${indent}<${name}>\n${inner.join("\n")}\n${indent}</${name}>`;
  }
  if (content === undefined) return "";
  return `${indent}<${name}>${escapeXml(String(content))}</${name}>`;
}

function document(root: Node): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n${render(root, 0)}\n`;
}

export function toNewRx(message: NewRxMessage): string {
  const { patient, prescriber, pharmacy, medication } = message;
  return document([
    "Message",
    [
      [
        "Header",
        [
          ["To", message.to ?? pharmacy.npi],
          ["From", message.from ?? prescriber.npi],
          ["MessageID", message.messageId],
          ["SentTime", message.sentTime],
        ],
      ],
      [
        "Body",
        [
          [
            "NewRx",
            [
              [
                "Patient",
                [
                  ["Identification", [["MemberID", patient.memberId]]],
                  [
                    "Name",
                    [
                      ["LastName", patient.lastName],
                      ["FirstName", patient.firstName],
                    ],
                  ],
                  ["Gender", patient.gender],
                  ["DateOfBirth", patient.dateOfBirth],
                ],
              ],
              [
                "Pharmacy",
                [
                  ["Identification", [["NPI", pharmacy.npi]]],
                  ["StoreName", pharmacy.name],
                ],
              ],
              [
                "Prescriber",
                [
                  ["Identification", [["NPI", prescriber.npi]]],
                  [
                    "Name",
                    [
                      ["LastName", prescriber.lastName],
                      ["FirstName", prescriber.firstName],
                    ],
                  ],
                  ["Specialty", prescriber.specialty],
                ],
              ],
              [
                "MedicationPrescribed",
                [
                  ["DrugDescription", medication.drugName],
                  ["DrugCoded", [["ProductCode", medication.ndc], ["ProductCodeQualifier", "ND"]]],
                  ["Quantity", [["Value", medication.quantity]]],
                  ["DaysSupply", medication.daysSupply],
                  ["WrittenDate", medication.writtenDate],
                  ["Substitutions", medication.substitutions ?? "0"],
                  ["NumberOfRefills", medication.refills],
                  ["Sig", [["SigText", medication.sig]]],
                  ["Diagnosis", medication.diagnosis === undefined ? undefined : [["Code", medication.diagnosis]]],
                ],
              ],
            ],
          ],
        ],
      ],
    ],
  ]);
}

export function toPaResponse(decision: PriorAuthDecision, request: PriorAuthRequest): string {
  const status: Node =
    decision.status === "approved"
      ? [
          "Approved",
          [
            ["PAReferenceID", decision.authorizationNumber],
            ["EffectiveDate", decision.effectiveDate],
            ["ExpirationDate", decision.expirationDate],
          ],
        ]
      : decision.status === "denied"
        ? ["Denied", decision.criteriaFailed.map((reason): Node => ["DenialReason", reason])]
        : ["Closed", [["CloseReason", decision.message]]];

  return document([
    "Message",
    [
      [
        "Header",
        [
          ["MessageID", `PAR-${decision.requestId}`],
          ["RelatesToMessageID", decision.requestId],
          ["SentTime", request.requestDate],
        ],
      ],
      [
        "Body",
        [
          [
            "PAResponse",
            [
              ["PatientID", decision.memberId],
              ["PrescriberNPI", request.prescriberNpi],
              ["DrugCoded", [["ProductCode", decision.ndc], ["DrugDescription", decision.drugName]]],
              ["ResponseStatus", [status]],
              ["Note", decision.message],
            ],
          ],
        ],
      ],
    ],
  ]);
}
