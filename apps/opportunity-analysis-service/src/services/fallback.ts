import { z } from "zod";
import { ClassificationResult, OpportunityRecord, OpportunityType } from "../types/opportunity";
import { isOpportunityType } from "./taxonomy";
import keywordRulesData from "../data/keywordRules.json";

const opportunityTypeSchema = z.custom<OpportunityType>(isOpportunityType, "not an opportunity type");

const keywordRuleSchema = z.object({
  type: opportunityTypeSchema,
  confidence: z.number().int().min(0).max(100),
  keywords: z.array(z.string().min(1)).min(1),
  reasoning: z.string(),
});

const keywordRulesSchema = z.object({
  rules: z.array(keywordRuleSchema),
  default: keywordRuleSchema.omit({ keywords: true }),
});

export type KeywordRule = z.infer<typeof keywordRuleSchema>;

const KEYWORD_RULES = keywordRulesSchema.parse(keywordRulesData);

/**
 * Rule-based categorization used when the model can't classify a record.
 * First matching rule wins; rule order is priority order.
 */
export function categorizeByKeywords(record: OpportunityRecord): ClassificationResult {
  const searchText = [record.opportunityName, record.description, record.onHoldReason ?? ""]
    .join(" ")
    .toLowerCase();

  const rule = KEYWORD_RULES.rules.find(r => r.keywords.some(k => searchText.includes(k)));
  const match = rule ?? KEYWORD_RULES.default;

  return {
    type: match.type,
    confidence: match.confidence,
    reasoning: match.reasoning,
  };
}

export function listKeywordRules(): readonly KeywordRule[] {
  return KEYWORD_RULES.rules;
}
