import { isPlatform } from 'shared'
import type { Platform, ResolveError, Result, ShellSpecification } from 'shared'
import { openProject, type ProjectOptions } from '../lib/project.js'
import { resolveAll, resolveLocked, summarizeReport } from '../lib/resolver.js'
import { formatReport } from '../lib/reporters/text.js'

export interface ShowOptions extends ProjectOptions {
  platform?: string
  json?: boolean
}

export interface ShowReport {
  results: Partial<Record<Platform, Result<ShellSpecification, ResolveError>>>
  summary: { ok: number; failed: number }
}

export async function showCommand(options: ShowOptions = {}): Promise<Result<ShowReport, string>> {
  let platform: Platform | undefined
  if (options.platform !== undefined) {
    if (!isPlatform(options.platform)) {
      return { ok: false, error: `Unknown platform: ${options.platform}` }
    }
    platform = options.platform
  }

  const projectResult = await openProject(options)
  if (!projectResult.ok) return projectResult
  const { descriptor, deps, config, lock } = projectResult.value

  let results: ShowReport['results'] = {}
  if (platform) {
    results[platform] = await resolveLocked(descriptor, platform, deps, { lock })
  } else {
    const report = await resolveAll(descriptor, deps, { concurrency: config.concurrency, lock })
    results = report.results
  }

  const summary = summarizeReport(results)
  const report: ShowReport = { results, summary }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2))
  } else {
    console.error(`\n${descriptor.description || 'Dev shell'}\n`)
    console.error(formatReport(results))
    console.error(`\n${summary.ok} resolved, ${summary.failed} failed\n`)
  }

  return { ok: true, value: report }
}
