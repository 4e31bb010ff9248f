/**
 * Quality gate: rubric-based draft evaluation.
 */

export { QualityGate } from './quality-gate.js'
export type { Assessment, EvaluateOptions, DraftEvaluator } from './quality-gate.js'
export { parseAssessment, normalizeConfidence, UNPARSABLE_ISSUE } from './assessment-parser.js'
export type { ParsedAssessment, AssessmentParseStatus } from './assessment-parser.js'
export { buildEvaluationPrompt, RUBRIC_CRITERIA, EVALUATOR_SYSTEM_PROMPT } from './rubric.js'
export type { Strictness } from './rubric.js'
