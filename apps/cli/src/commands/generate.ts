/**
 * generate command: run the article pipeline for each topic, or for one
 * section of an outline file, through the batch runner.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { Ok, Err, KBForgeError, createBatchRunner, dryRunReport, errorMessage, parseOutlineSection } from '@kbforge/core'
import type { BatchReport, BatchTopic, Result } from '@kbforge/core'
import {
  EXIT_FAILURE,
  EXIT_OK,
  errorResult,
  failure,
  parseFormat,
  parsePositiveInt,
  withKnowledgeBase,
} from '../utils/context.js'
import type { CommandContext, CommandResult } from '../utils/context.js'
import { formatBatchReport, formatJson } from '../utils/output.js'

export interface GenerateCommandOptions {
  outline?: string
  section?: string
  workers?: string
  dryRun?: boolean
  format?: string
  /** Cancels the batch; the CLI wires it to SIGINT. */
  signal?: AbortSignal
}

async function topicsFromOutline(path: string, section: string): Promise<Result<BatchTopic[], KBForgeError>> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (e) {
    return Err(KBForgeError.io(`Failed to read outline ${path}: ${errorMessage(e)}`))
  }
  const parsed = parseOutlineSection(text, section)
  if (!parsed.ok) return parsed
  console.log(`[batch] outline section ${parsed.value.sectionNumber} "${parsed.value.name}": ${parsed.value.subsections.length} subsection(s)`)
  return Ok([{
    topic: parsed.value.name,
    subtopics: parsed.value.subsections,
    sectionPath: parsed.value.sectionNumber,
  }])
}

function render(report: BatchReport, format: 'text' | 'json'): CommandResult {
  return {
    output: format === 'json' ? formatJson(report) : formatBatchReport(report),
    exitCode: report.failed > 0 ? EXIT_FAILURE : EXIT_OK,
  }
}

export async function executeGenerate(
  topicArgs: string[],
  options: GenerateCommandOptions,
  ctx: CommandContext = {},
): Promise<CommandResult> {
  const format = parseFormat(options.format)
  if (!format.ok) return errorResult(format.error)
  const workers = parsePositiveInt(options.workers, '--workers')
  if (!workers.ok) return errorResult(workers.error)

  let topics: BatchTopic[]
  if (options.outline || options.section) {
    if (!options.outline || !options.section) return failure('--outline and --section must be given together')
    const fromOutline = await topicsFromOutline(resolve(ctx.cwd ?? process.cwd(), options.outline), options.section)
    if (!fromOutline.ok) return errorResult(fromOutline.error)
    topics = fromOutline.value
  } else {
    topics = topicArgs.map((t) => t.trim()).filter((t) => t.length > 0).map((topic) => ({ topic }))
  }
  if (topics.length === 0) return failure('no topics given (pass topics or --outline with --section)')

  if (options.dryRun) return render(dryRunReport(topics), format.value)

  return withKnowledgeBase(ctx, async (kb, config) => {
    const runner = createBatchRunner(config, kb, { generator: ctx.generator, evaluator: ctx.evaluator })
    const report = await runner.run(topics, {
      maxWorkers: workers.value ?? config.batch.maxWorkers,
      signal: options.signal,
      reindexAfterRun: config.batch.reindexAfterRun,
    })
    return render(report, format.value)
  })
}
