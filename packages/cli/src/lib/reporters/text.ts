import type { Platform, ResolveError, Result, ShellSpecification } from 'shared'
import { sourceKey } from '../source-ref.js'

export function formatResolveError(error: ResolveError): string {
  return `[${error.type}] ${error.message}`
}

export function formatShellSpecification(spec: ShellSpecification): string[] {
  const lines = [`  ✓ ${spec.platform}  (${sourceKey(spec.source)})`]
  if (spec.tools.length === 0) {
    lines.push('      (no build inputs)')
  }
  for (const tool of spec.tools) {
    const version = tool.version ? `-${tool.version}` : ''
    lines.push(`      ${tool.id} → ${tool.name}${version} (${tool.path})`)
  }
  return lines
}

/** Human-readable listing of per-platform results; each failure takes one line. */
export function formatReport(results: Partial<Record<Platform, Result<ShellSpecification, ResolveError>>>): string {
  const lines: string[] = []
  for (const [platform, result] of Object.entries(results)) {
    if (!result) continue
    if (result.ok) {
      lines.push(...formatShellSpecification(result.value))
    } else {
      lines.push(`  ✗ ${platform}  ${formatResolveError(result.error)}`)
    }
  }
  return lines.join('\n')
}
