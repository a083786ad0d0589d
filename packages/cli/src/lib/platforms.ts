import { DEFAULT_PLATFORMS, isPlatform } from 'shared'
import type { Descriptor, Platform, Result } from 'shared'

export interface PlatformEnumerator {
  defaultPlatforms(): Platform[]
}

export const defaultPlatformEnumerator: PlatformEnumerator = {
  defaultPlatforms: () => [...DEFAULT_PLATFORMS],
}

export function fixedPlatformEnumerator(platforms: Platform[]): PlatformEnumerator {
  return { defaultPlatforms: () => [...platforms] }
}

/**
 * Platforms a descriptor can be resolved for: the enumerator's set, narrowed
 * to `outputs.platforms` when the descriptor lists them.
 */
export function supportedPlatforms(descriptor: Descriptor, enumerator: PlatformEnumerator): Platform[] {
  const defaults = enumerator.defaultPlatforms()
  const restriction = descriptor.outputs.platforms
  if (!restriction) return defaults
  return defaults.filter(platform => restriction.includes(platform))
}

const ARCH_MAP: Partial<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i686',
  arm: 'armv7l',
}

export interface HostInfo {
  platform: string
  arch: string
}

export function hostPlatform(info: HostInfo = { platform: process.platform, arch: process.arch }): Platform | null {
  const arch = ARCH_MAP[info.arch]
  if (!arch) return null
  const candidate = `${arch}-${info.platform}`
  return isPlatform(candidate) ? candidate : null
}

/** The requested platform when given, the host's otherwise. */
export function selectPlatform(requested: string | undefined, host: Platform | null = hostPlatform()): Result<Platform, string> {
  if (requested !== undefined) {
    return isPlatform(requested) ? { ok: true, value: requested } : { ok: false, error: `Unknown platform: ${requested}` }
  }
  if (!host) {
    return { ok: false, error: `Cannot map host ${process.platform}/${process.arch} to a platform; pass --platform` }
  }
  return { ok: true, value: host }
}
