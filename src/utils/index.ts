// File: src/utils/index.ts
// Export all utilities

export * from './formatter'
export * from './logger'
export * from './clients'
export * from './collector'

/**
 * Helper to collect multiple region options
 */
export function collectRegions(val: string, regions: string[] = []): string[] {
  return [...regions, val]
}
