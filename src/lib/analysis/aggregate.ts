import {
  ALERT_RISK_AT_LEAST,
  ALERT_SCORE_BELOW,
  COMPLIANCE_RANGE,
  DATA_SENSITIVITY_RANGE,
  RISK_RANGE,
  SCORE_OBFUSCATION_MULTIPLIER
} from "@/lib/constants";
import { isIntegerInRange } from "@/lib/utils";

export interface AnalysisInput {
  dataSensitivity: number;
  gdprCompliance: number;
  ccpaCompliance: number;
  retentionRisk: number;
  sharingRisk: number;
}

export interface AnalysisAggregate {
  overallScore: number;
  overallRisk: number;
  /** Plaintext that gets sealed into the document's score field. */
  sealedScorePlaintext: number;
  alert: boolean;
  reason: string;
}

export function validateAnalysisInput(input: AnalysisInput): string | null {
  if (!isIntegerInRange(input.dataSensitivity, DATA_SENSITIVITY_RANGE)) return "Data sensitivity must be 0-100";
  if (!isIntegerInRange(input.gdprCompliance, COMPLIANCE_RANGE) || !isIntegerInRange(input.ccpaCompliance, COMPLIANCE_RANGE)) {
    return "Compliance scores must be 0-10";
  }
  if (!isIntegerInRange(input.retentionRisk, RISK_RANGE)) return "Retention risk must be 1-5";
  if (!isIntegerInRange(input.sharingRisk, RISK_RANGE)) return "Sharing risk must be 1-5";
  return null;
}

export function aggregateAnalysis(input: AnalysisInput): AnalysisAggregate {
  const overallScore = Math.floor((input.gdprCompliance + input.ccpaCompliance) / 2);
  const overallRisk = Math.floor((input.retentionRisk + input.sharingRisk) / 2);
  const lowScore = overallScore < ALERT_SCORE_BELOW;
  const highRisk = overallRisk >= ALERT_RISK_AT_LEAST;

  let reason = "Within compliance thresholds";
  if (lowScore && highRisk) {
    reason = `Score ${overallScore} below ${ALERT_SCORE_BELOW} and risk ${overallRisk} at or above ${ALERT_RISK_AT_LEAST}`;
  } else if (lowScore) {
    reason = `Score ${overallScore} below ${ALERT_SCORE_BELOW}`;
  } else if (highRisk) {
    reason = `Risk ${overallRisk} at or above ${ALERT_RISK_AT_LEAST}`;
  }

  return {
    overallScore,
    overallRisk,
    sealedScorePlaintext: overallScore * SCORE_OBFUSCATION_MULTIPLIER,
    alert: lowScore || highRisk,
    reason
  };
}
