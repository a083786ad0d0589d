import { readFile, access } from 'node:fs/promises'
import { join } from 'node:path'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { descriptorSchema, isPlatform } from 'shared'
import type { Descriptor, DescriptorFile, Platform, SourceReference, Result, ValidationError } from 'shared'
import { parseSourceRef } from './source-ref.js'

export const DESCRIPTOR_FILE = 'devshell.yaml'
export const SELF_INPUT = 'self'
export const DEFAULT_PACKAGES_INPUT = 'nixpkgs'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateDescriptorFile = ajv.compile<DescriptorFile>(descriptorSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Input names that the outputs refer to but `inputs` does not declare.
 * `self` is always bound as an argument, but it has no snapshot, so it
 * cannot be the package input.
 */
export function findUnresolvedInputs(descriptor: Descriptor): string[] {
  const missing = new Set<string>()
  for (const name of descriptor.outputs.args) {
    if (name === SELF_INPUT) continue
    if (!Object.hasOwn(descriptor.inputs, name)) missing.add(name)
  }
  const { packages } = descriptor.outputs.devShell
  if (!Object.hasOwn(descriptor.inputs, packages)) missing.add(packages)
  return [...missing]
}

function freezeDescriptor(descriptor: Descriptor): Descriptor {
  for (const source of Object.values(descriptor.inputs)) Object.freeze(source)
  Object.freeze(descriptor.inputs)
  Object.freeze(descriptor.outputs.devShell.buildInputs)
  if (descriptor.outputs.devShell.env) Object.freeze(descriptor.outputs.devShell.env)
  Object.freeze(descriptor.outputs.devShell)
  Object.freeze(descriptor.outputs.args)
  if (descriptor.outputs.platforms) Object.freeze(descriptor.outputs.platforms)
  Object.freeze(descriptor.outputs)
  return Object.freeze(descriptor)
}

/**
 * Turn a parsed YAML document into a Descriptor, or the list of everything
 * wrong with it.
 */
export function parseDescriptor(document: unknown, fileName = DESCRIPTOR_FILE): Result<Descriptor, ValidationError[]> {
  if (!validateDescriptorFile(document)) {
    const schemaErrors = (validateDescriptorFile.errors ?? []).map((e): ValidationError => ({
      kind: 'schema',
      path: `${fileName}${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  const errors: ValidationError[] = []

  const inputs: Record<string, SourceReference> = {}
  for (const [name, text] of Object.entries(document.inputs)) {
    const parsed = parseSourceRef(text)
    if (parsed.ok) {
      inputs[name] = parsed.value
    } else {
      errors.push({ kind: 'schema', path: `${fileName}/inputs/${name}`, message: parsed.error })
    }
  }

  const platforms: Platform[] = []
  for (const platform of document.outputs.platforms ?? []) {
    if (isPlatform(platform)) {
      platforms.push(platform)
    } else {
      errors.push({ kind: 'schema', path: `${fileName}/outputs/platforms`, message: `Unknown platform: ${platform}` })
    }
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  const { devShell } = document.outputs
  const packages = devShell.packages ?? DEFAULT_PACKAGES_INPUT
  const args = document.outputs.args ?? [SELF_INPUT, ...Object.keys(inputs)]

  const descriptor: Descriptor = {
    description: document.description ?? '',
    inputs,
    outputs: {
      args,
      devShell: {
        packages,
        buildInputs: [...devShell.buildInputs],
        ...(devShell.shellHook !== undefined ? { shellHook: devShell.shellHook } : {}),
        ...(devShell.env ? { env: { ...devShell.env } } : {}),
      },
      ...(document.outputs.platforms ? { platforms } : {}),
    },
  }

  for (const name of findUnresolvedInputs(descriptor)) {
    errors.push({ kind: 'UnresolvedInput', path: `${fileName}/outputs`, message: `Input "${name}" is referenced but not declared in inputs` })
  }

  if (!args.includes(packages) && Object.hasOwn(inputs, packages)) {
    errors.push({ kind: 'UnresolvedInput', path: `${fileName}/outputs/devShell/packages`, message: `Input "${packages}" is not bound in outputs.args` })
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }

  return { ok: true, value: freezeDescriptor(descriptor) }
}

export async function loadDescriptor(directory: string, fileName = DESCRIPTOR_FILE): Promise<Result<Descriptor, ValidationError[]>> {
  const descriptorPath = join(directory, fileName)

  if (!(await fileExists(descriptorPath))) {
    return { ok: false, error: [{ kind: 'schema', path: fileName, message: `${fileName} not found` }] }
  }

  let document: unknown
  try {
    const content = await readFile(descriptorPath, 'utf-8')
    document = parseYaml(content)
  } catch (error) {
    return { ok: false, error: [{ kind: 'schema', path: fileName, message: `Failed to parse ${fileName}: ${error}` }] }
  }

  return parseDescriptor(document, fileName)
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(e => `  ${e.path}: ${e.message}`).join('\n')
}
