import type { Platform } from './platforms.js'

export interface SourceReference {
  host: string
  owner: string
  repo: string
  ref: string
  revision?: string
}

export interface DevShellDeclaration {
  packages: string
  buildInputs: string[]
  shellHook?: string
  env?: Record<string, string>
}

export interface DescriptorOutputs {
  args: string[]
  devShell: DevShellDeclaration
  platforms?: Platform[]
}

export interface Descriptor {
  description: string
  inputs: Record<string, SourceReference>
  outputs: DescriptorOutputs
}

/** devshell.yaml as written on disk, before source references are parsed */
export interface DescriptorFile {
  description?: string
  inputs: Record<string, string>
  outputs: {
    args?: string[]
    devShell: {
      packages?: string
      buildInputs: string[]
      shellHook?: string
      env?: Record<string, string>
    }
    platforms?: string[]
  }
}

export interface ToolReference {
  id: string
  name: string
  version: string
  path: string
}

export interface ShellSpecification {
  platform: Platform
  description: string
  tools: ToolReference[]
  env: Record<string, string>
  shellHook?: string
  source: SourceReference
}

export interface SnapshotPackage {
  name: string
  version: string
  path: string
}

export interface Snapshot {
  revision: string
  platform: string
  packages: Record<string, SnapshotPackage>
}

export type ResolveErrorType = 'UnresolvedInput' | 'UnreachableSource' | 'UnsupportedPlatform' | 'ToolNotFound'

export interface ResolveError {
  type: ResolveErrorType
  message: string
  platform?: Platform
  input?: string
  tools?: string[]
}

export interface LockedInput {
  source: string
  revision: string
  lockedAt: string
}

export interface Lockfile {
  lockfileVersion: 1
  inputs: Record<string, LockedInput>
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  kind: 'schema' | 'UnresolvedInput'
  path: string
  message: string
}
