import { OpportunityRecord } from "../types/opportunity";
import { InvalidRecordError } from "../lib/errors";
import { listOpportunityTypes } from "./taxonomy";

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export type ChatMessage = SystemMessage | UserMessage;

export const MAX_FIELD_LENGTH = 2000;

const SYSTEM_PROMPT =
  "You are a cybersecurity expert that analyzes business opportunities and categorizes them accurately. " +
  "Always respond with valid JSON only.";

// Hints appended to the taxonomy so the model weighs the right signals per type
const DOMAIN_HINTS = [
  "Security assessments and audits",
  "Cloud security implementations",
  "Endpoint protection and management",
  "SIEM, SOC, and monitoring services",
  "Identity and access management",
  "Network security and firewalls",
  "Data protection and encryption",
  "Vulnerability scanning and management",
  "Compliance requirements",
  "Incident response capabilities",
  "Security training and awareness",
  "Mainframe and legacy system security",
];

/**
 * Build the chat messages that ask the model to classify one opportunity.
 * Throws InvalidRecordError when a required field is missing.
 */
export function buildClassificationPrompt(record: OpportunityRecord): ChatMessage[] {
  assertRecord(record);

  const onHold = record.onHoldReason ? sanitizePromptText(record.onHoldReason) : "";

  const user = [
    "You are a cybersecurity expert analyzing business opportunities. Based on the information provided, " +
      "determine the most appropriate security opportunity type.",
    "",
    `Available Types: ${listOpportunityTypes().join(", ")}`,
    "",
    "Opportunity Information:",
    `- Name: "${sanitizePromptText(record.opportunityName)}"`,
    `- Description: "${sanitizePromptText(record.description)}"`,
    `- On Hold Reason: "${onHold || "N/A"}"`,
    "",
    "Please analyze this opportunity and respond with a JSON object containing:",
    "{",
    '  "type": "one of the available types that best matches",',
    '  "confidence": integer between 0 and 100 indicating confidence level,',
    '  "reasoning": "brief explanation of why this type was chosen"',
    "}",
    "",
    "Focus on identifying key security domains, technologies, and services mentioned. Consider:",
    ...DOMAIN_HINTS.map(hint => `- ${hint}`),
    "",
    "Respond only with the JSON object, no additional text.",
  ].join("\n");

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: user },
  ];
}

/**
 * Make free text safe to embed inside a quoted prompt field
 */
export function sanitizePromptText(text: string): string {
  let clean = text
    .replace(/\r\n?/g, "\n")
    // C0/C1 controls except tab and newline
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g, "")
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n{3,}/g, "\n\n")
    .trim();

  const chars = Array.from(clean);
  if (chars.length > MAX_FIELD_LENGTH) {
    clean = chars.slice(0, MAX_FIELD_LENGTH - 1).join("") + "…";
  }
  return clean;
}

function assertRecord(record: OpportunityRecord): void {
  const id = typeof record.id === "string" && record.id.trim() ? record.id : null;
  if (id === null) {
    throw new InvalidRecordError("id", null);
  }
  if (typeof record.opportunityName !== "string") {
    throw new InvalidRecordError("opportunityName", id);
  }
  if (typeof record.description !== "string") {
    throw new InvalidRecordError("description", id);
  }
  if (record.onHoldReason != null && typeof record.onHoldReason !== "string") {
    throw new InvalidRecordError("onHoldReason", id);
  }
}
