export const ARCHITECTURES = ['x86_64', 'aarch64', 'i686', 'armv7l'] as const
export const OPERATING_SYSTEMS = ['linux', 'darwin'] as const

export type Architecture = typeof ARCHITECTURES[number]
export type OperatingSystem = typeof OPERATING_SYSTEMS[number]
export type Platform = `${Architecture}-${OperatingSystem}`

export const KNOWN_PLATFORMS: readonly Platform[] = ARCHITECTURES.flatMap(arch =>
  OPERATING_SYSTEMS.map((os): Platform => `${arch}-${os}`)
)

export const DEFAULT_PLATFORMS: readonly Platform[] = [
  'x86_64-linux',
  'aarch64-linux',
  'x86_64-darwin',
  'aarch64-darwin',
]

export function isPlatform(value: string): value is Platform {
  return KNOWN_PLATFORMS.some(platform => platform === value)
}
