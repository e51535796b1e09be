/**
 * Allowlist of environment variables passed through to the worker.
 * Keeps supervisor secrets (API_SECRET, channel tokens) out of it.
 */
const SAFE_ENV_KEYS = [
  'PATH',
  'HOME',
  'USER',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TERM',
  'TZ',
  // Worker auth
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'GOOGLE_API_KEY',
  'GEMINI_API_KEY',
  'IS_SANDBOX',
  'TMPDIR',
  'XDG_CONFIG_HOME',
  'XDG_DATA_HOME',
  'XDG_CACHE_HOME',
  'SSL_CERT_FILE',
  'SSL_CERT_DIR',
  'NODE_EXTRA_CA_CERTS',
  'HTTPS_PROXY',
  'HTTP_PROXY',
  'NO_PROXY',
]

/**
 * Allowlisted vars from `source`, merged with the caller's extras
 * (extras win).
 */
export function safeEnv(
  extra?: Record<string, string>,
  source: Record<string, string | undefined> = process.env,
): Record<string, string> {
  const env: Record<string, string> = {}
  for (const key of SAFE_ENV_KEYS) {
    const value = source[key]
    if (value) {
      env[key] = value
    }
  }
  if (extra) {
    Object.assign(env, extra)
  }
  return env
}
