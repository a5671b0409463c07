import { OpportunityType, UnknownOpportunityType } from "../types/opportunity";

const OPPORTUNITY_TYPES: readonly OpportunityType[] = [
  "Security Assessment",
  "Cloud Security",
  "Endpoint Security",
  "SIEM/SOC",
  "Identity Management",
  "Network Security",
  "Data Protection",
  "Vulnerability Management",
  "Compliance & Audit",
  "Incident Response",
  "Security Training",
  "Mainframe Security",
];

/** Assigned when the model answers with a label outside the taxonomy */
export const UNKNOWN_OPPORTUNITY_TYPE: UnknownOpportunityType = "Unknown";

const BY_LOWERCASE = new Map<string, OpportunityType>(
  OPPORTUNITY_TYPES.map(type => [type.toLowerCase(), type])
);

export function listOpportunityTypes(): readonly OpportunityType[] {
  return OPPORTUNITY_TYPES;
}

export function isOpportunityType(value: unknown): value is OpportunityType {
  return OPPORTUNITY_TYPES.some(type => type === value);
}

/**
 * Map a model-supplied label onto its canonical taxonomy entry
 * ("  cloud security " → "Cloud Security"), or null if it isn't one
 */
export function resolveOpportunityType(value: string): OpportunityType | null {
  return BY_LOWERCASE.get(value.trim().toLowerCase()) ?? null;
}
