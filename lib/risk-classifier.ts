import { RISK_LEVELS, type LoadThresholds, type RiskLevel } from "./load-types";

export function classifyRisk(load: number, thresholds: LoadThresholds): RiskLevel {
  if (!Number.isFinite(load)) return "critical";
  if (load < thresholds.safe) return "safe";
  if (load < thresholds.caution) return "caution";
  if (load < thresholds.high) return "high";
  return "critical";
}

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

export function riskLevelLabel(level: RiskLevel): string {
  switch (level) {
    case "safe": return "Safe";
    case "caution": return "Caution";
    case "high": return "High risk";
    case "critical": return "Rest needed";
  }
}
