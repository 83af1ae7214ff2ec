export type { Segment, SegmentKind } from "./segments";
export type {
  Match,
  Pattern,
  PatternDefinition,
  PatternHit,
  PatternMetadata,
  PatternOverride,
  PatternThresholds,
  Severity,
  ThresholdKey,
  ViolationCategory,
} from "./patterns";
export {
  isSeverity,
  isThresholdKey,
  isViolationCategory,
  SEVERITY_LEVELS,
  THRESHOLD_KEYS,
  VIOLATION_CATEGORIES,
} from "./patterns";
export type {
  ClassifierConfig,
  ComplianceReport,
  ComplianceVerdict,
  QuestionBank,
} from "./reports";
