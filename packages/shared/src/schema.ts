const identifier = '^[A-Za-z_][A-Za-z0-9_-]*$'
const attributePath = '^[A-Za-z_][A-Za-z0-9_+-]*(\\.[A-Za-z_][A-Za-z0-9_+-]*)*$'

export const descriptorSchema = {
  type: 'object',
  required: ['inputs', 'outputs'],
  properties: {
    description: { type: 'string' },
    inputs: {
      type: 'object',
      propertyNames: { pattern: identifier },
      additionalProperties: { type: 'string', minLength: 1 },
    },
    outputs: {
      type: 'object',
      required: ['devShell'],
      properties: {
        args: {
          type: 'array',
          items: { type: 'string', pattern: identifier },
          uniqueItems: true,
        },
        platforms: {
          type: 'array',
          items: { type: 'string' },
          uniqueItems: true,
          minItems: 1,
        },
        devShell: {
          type: 'object',
          required: ['buildInputs'],
          properties: {
            packages: { type: 'string', pattern: identifier },
            buildInputs: {
              type: 'array',
              items: { type: 'string', pattern: attributePath },
              uniqueItems: true,
            },
            shellHook: { type: 'string' },
            env: {
              type: 'object',
              propertyNames: { pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
              additionalProperties: { type: 'string' },
            },
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const

export const snapshotSchema = {
  type: 'object',
  required: ['revision', 'platform', 'packages'],
  properties: {
    revision: { type: 'string', minLength: 1 },
    platform: { type: 'string', minLength: 1 },
    packages: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['name', 'version', 'path'],
        properties: {
          name: { type: 'string', minLength: 1 },
          version: { type: 'string' },
          path: { type: 'string', minLength: 1 },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const

/** A revision, owner or repo name that is safe to use as one path segment. */
export function isSafeSegment(value: string): boolean {
  return /^[A-Za-z0-9._-]+$/.test(value) && value !== '.' && value !== '..'
}
