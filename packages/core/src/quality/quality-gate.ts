/**
 * QualityGate: scores a draft against its source context.
 *
 * The evaluator capability is asked for a JSON assessment; the response is
 * post-processed deterministically. A failed evaluation call scores 0 with the
 * failure recorded as an issue.
 */

import type { TextGenerator } from '../agents/index.js'
import type { QualityConfig } from '../config/index.js'
import type { ContextBundle } from '../retrieval/index.js'
import { renderContext } from '../retrieval/index.js'
import { parseAssessment } from './assessment-parser.js'
import type { AssessmentParseStatus } from './assessment-parser.js'
import { buildEvaluationPrompt, EVALUATOR_SYSTEM_PROMPT } from './rubric.js'
import type { Strictness } from './rubric.js'

export interface Assessment {
  /** In [0, 1]. */
  confidence: number
  issues: string[]
  passed: boolean
  status: AssessmentParseStatus | 'evaluation_failed'
  strictness: Strictness
}

export interface EvaluateOptions {
  strictness?: Strictness
  signal?: AbortSignal
}

export interface DraftEvaluator {
  evaluate(draft: string, context: ContextBundle, topic: string, options?: EvaluateOptions): Promise<Assessment>
}

export class QualityGate implements DraftEvaluator {
  constructor(
    private readonly evaluator: TextGenerator,
    private readonly config: Pick<QualityConfig, 'threshold'>,
  ) {}

  get threshold(): number {
    return this.config.threshold
  }

  async evaluate(
    draft: string,
    context: ContextBundle,
    topic: string,
    options: EvaluateOptions = {},
  ): Promise<Assessment> {
    const strictness = options.strictness ?? 'high'
    const response = await this.evaluator.generate(
      buildEvaluationPrompt(draft, topic, strictness),
      renderContext(context),
      { systemPrompt: EVALUATOR_SYSTEM_PROMPT, signal: options.signal, operation: `evaluate:${topic.slice(0, 40)}` },
    )

    if (!response.ok) {
      console.error(`[quality] evaluation of "${topic}" failed: ${response.error.message}`)
      return {
        confidence: 0,
        issues: [`evaluation failed: ${response.error.message}`],
        passed: false,
        status: 'evaluation_failed',
        strictness,
      }
    }

    const parsed = parseAssessment(response.value)
    const passed = parsed.confidence >= this.config.threshold
    if (parsed.status === 'unparsable') {
      console.warn(`[quality] unparsable assessment for "${topic}"`)
    }
    console.log(
      `[quality] "${topic}" (${strictness}): confidence ${parsed.confidence.toFixed(2)} ${passed ? 'PASS' : 'FAIL'}, ${parsed.issues.length} issue(s)`,
    )
    return { ...parsed, passed, strictness }
  }
}
