import { writeFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'yaml'
import type { DescriptorFile, Result } from 'shared'
import { DESCRIPTOR_FILE } from '../lib/loader.js'

export interface InitOptions {
  cwd?: string
  description?: string
  packages?: string
  force?: boolean
}

export const DEFAULT_PACKAGES_SOURCE = 'github:NixOS/nixpkgs/release-23.11'

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export function starterDescriptor(options: Pick<InitOptions, 'description' | 'packages'> = {}): DescriptorFile {
  return {
    description: options.description ?? 'A very basic dev shell',
    inputs: {
      nixpkgs: options.packages ?? DEFAULT_PACKAGES_SOURCE,
    },
    outputs: {
      args: ['self', 'nixpkgs'],
      devShell: {
        packages: 'nixpkgs',
        buildInputs: ['stdenv.cc'],
      },
    },
  }
}

export async function initCommand(options: InitOptions = {}): Promise<Result<string, string>> {
  const cwd = options.cwd ?? process.cwd()
  const descriptorPath = join(cwd, DESCRIPTOR_FILE)

  if (await fileExists(descriptorPath)) {
    if (!options.force) {
      return { ok: false, error: `${DESCRIPTOR_FILE} already exists. Use --force to overwrite.` }
    }
  }

  await writeFile(descriptorPath, stringify(starterDescriptor(options)))

  console.error(`✅ Created ${DESCRIPTOR_FILE}`)
  console.error(`\nNext steps:`)
  console.error(`  shellpin lock    Pin the package snapshot`)
  console.error(`  shellpin shell   Enter the dev shell`)

  return { ok: true, value: descriptorPath }
}
