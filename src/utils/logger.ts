// File: src/utils/logger.ts
// Progress messages go to stderr so stdout carries only command results (e.g. -o json)

export function logProgress(message: string): void {
  console.error(message)
}
