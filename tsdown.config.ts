import type {UserConfig} from 'tsdown'

export const BUNDLE_OUT_DIR = 'bundle'

export const BUNDLE_ENTRIES = ['src/launch.ts', 'src/setup.ts'] as const

/**
 * Everything except Node built-ins is inlined, so each script runs alone once
 * downloaded.
 */
export function isBundledDependency(id: string): boolean {
  // Bundle all @actions/* packages
  if (id.startsWith('@actions/')) return true
  if (id === 'zod') return true
  return false
}

// One build per entry: a shared chunk would be left behind when only the
// entry file is fetched. `.mjs` keeps the file ESM outside any package scope.
export const bundleConfigs: UserConfig[] = BUNDLE_ENTRIES.map((entry): UserConfig => ({
  entry: [entry],
  outDir: BUNDLE_OUT_DIR,
  format: 'esm',
  platform: 'node',
  target: 'node20',
  fixedExtension: true,
  clean: false,
  dts: false,
  minify: true,
  noExternal: isBundledDependency,
}))

export default bundleConfigs
