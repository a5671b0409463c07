/**
 * Opportunity analysis types
 * Shapes match the JSON contract of POST /analyze-opportunities
 */

// ============================================================================
// TAXONOMY
// ============================================================================

export type OpportunityType =
  | "Security Assessment"
  | "Cloud Security"
  | "Endpoint Security"
  | "SIEM/SOC"
  | "Identity Management"
  | "Network Security"
  | "Data Protection"
  | "Vulnerability Management"
  | "Compliance & Audit"
  | "Incident Response"
  | "Security Training"
  | "Mainframe Security";

export type UnknownOpportunityType = "Unknown";

export type ClassifiedType = OpportunityType | UnknownOpportunityType;

// ============================================================================
// REQUEST
// ============================================================================

/**
 * Salesforce opportunity fields sent for analysis
 */
export interface OpportunityRecord {
  readonly id: string;
  readonly opportunityName: string;
  readonly description: string;
  readonly onHoldReason?: string | null;
}

export type BatchRequest = readonly OpportunityRecord[];

export interface AnalysisRequestBody {
  opportunities: OpportunityRecord[];
}

// ============================================================================
// RESULT
// ============================================================================

export interface ClassificationResult {
  type: ClassifiedType;
  /** Integer 0-100 */
  confidence: number;
  reasoning: string;
}

/**
 * Where a result came from: the model, or the keyword rules after the model failed
 */
export type ClassificationSource = "model" | "keyword_fallback";

/**
 * Per-record outcome, in batch order
 */
export type RecordOutcome =
  | { id: string; ok: true; result: ClassificationResult; source: ClassificationSource }
  | { id: string; ok: false; error: Error };

export interface BatchResponse {
  results: Record<string, ClassificationResult>;
  processed_count: number;
  /** ISO-8601, stamped after the last record settled */
  timestamp: string;
}
