export function supportsColor(
  stream: NodeJS.WritableStream,
  env: Record<string, string | undefined>
): boolean {
  if (env.NO_COLOR) return false
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return true
  if (!('isTTY' in stream) || stream.isTTY !== true) return false
  return env.TERM !== 'dumb'
}

export function ansi(code: string, text: string, enabled: boolean): string {
  if (!enabled) return text
  return `\u001b[${code}m${text}\u001b[0m`
}
