import type { Platform, Result } from 'shared'
import { loadDescriptor, formatValidationErrors, DESCRIPTOR_FILE } from '../lib/loader.js'
import { defaultPlatformEnumerator, hostPlatform, supportedPlatforms, type PlatformEnumerator } from '../lib/platforms.js'

export interface PlatformsOptions {
  cwd?: string
  json?: boolean
  platforms?: PlatformEnumerator
  host?: Platform | null
}

export interface PlatformListing {
  platforms: Platform[]
  host: Platform | null
}

export async function platformsCommand(options: PlatformsOptions = {}): Promise<Result<PlatformListing, string>> {
  const descriptorResult = await loadDescriptor(options.cwd ?? process.cwd())
  if (!descriptorResult.ok) {
    return { ok: false, error: `Invalid ${DESCRIPTOR_FILE}:\n${formatValidationErrors(descriptorResult.error)}` }
  }

  const platforms = supportedPlatforms(descriptorResult.value, options.platforms ?? defaultPlatformEnumerator)
  const host = options.host === undefined ? hostPlatform() : options.host
  const listing: PlatformListing = { platforms, host }

  if (options.json) {
    console.log(JSON.stringify(listing, null, 2))
  } else {
    for (const platform of platforms) {
      console.error(`  ${platform}${platform === host ? '  (host)' : ''}`)
    }
  }

  return { ok: true, value: listing }
}
