/**
 * Structured read-modify-write for line-oriented key/value config files
 * (sshd_config, login.defs, sysctl.conf).
 *
 * Comments, blank lines and unknown lines are kept verbatim. Setting a key
 * rewrites every active occurrence outside conditional sections, otherwise
 * revives a commented-out occurrence, otherwise inserts a new line before the
 * first conditional section (sshd `Match`) or at the end of the file.
 */

export interface KeyValueDialect {
  name: string
  /** Split a directive into key and value, or null for non-directive lines */
  parse(line: string): { key: string; value: string } | null
  format(key: string, value: string): string
  normalizeKey(key: string): string
  /** Which occurrence the consumer of the file honours */
  precedence: 'first' | 'last'
  /** Lines that start a conditional block; everything after is not global */
  sectionStart?: RegExp
}

export const sshdDialect: KeyValueDialect = {
  name: 'sshd_config',
  parse(line) {
    const match = line.match(/^([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+)(.*)$/)
    if (!match) return null
    return { key: match[1] ?? '', value: (match[2] ?? '').trim() }
  },
  format: (key, value) => `${key} ${value}`,
  // sshd keywords are case-insensitive
  normalizeKey: key => key.toLowerCase(),
  precedence: 'first',
  sectionStart: /^Match\s/i,
}

export const loginDefsDialect: KeyValueDialect = {
  name: 'login.defs',
  parse(line) {
    const match = line.match(/^([A-Z][A-Z0-9_]*)\s+(.*)$/)
    if (!match) return null
    return { key: match[1] ?? '', value: (match[2] ?? '').trim() }
  },
  format: (key, value) => `${key}\t${value}`,
  normalizeKey: key => key,
  precedence: 'first',
}

export const sysctlDialect: KeyValueDialect = {
  name: 'sysctl.conf',
  parse(line) {
    const match = line.match(/^-?([A-Za-z0-9_][A-Za-z0-9_./-]*)\s*=\s*(.*)$/)
    if (!match) return null
    return { key: match[1] ?? '', value: (match[2] ?? '').trim() }
  },
  format: (key, value) => `${key} = ${value}`,
  // "net/ipv4/ip_forward" and "net.ipv4.ip_forward" name the same parameter
  normalizeKey: key => key.replace(/\//g, '.'),
  precedence: 'last',
}

interface ConfigLine {
  raw: string
  key?: string
  value?: string
  commented: boolean
  /** Inside a conditional section */
  conditional: boolean
}

export type SetOutcome = 'unchanged' | 'replaced' | 'uncommented' | 'inserted'

export class KeyValueConfig {
  private constructor(
    private readonly dialect: KeyValueDialect,
    private lines: ConfigLine[],
    private readonly trailingNewline: boolean
  ) {}

  static parse(text: string, dialect: KeyValueDialect): KeyValueConfig {
    const trailingNewline = text.length === 0 || text.endsWith('\n')
    const rawLines = text.split('\n')
    if (text.endsWith('\n') || text.length === 0) rawLines.pop()

    let conditional = false
    const lines = rawLines.map((raw): ConfigLine => {
      const trimmed = raw.trim()
      if (dialect.sectionStart?.test(trimmed)) conditional = true

      if (trimmed.startsWith('#')) {
        const directive = dialect.parse(trimmed.replace(/^#+\s*/, ''))
        // Prose comments that merely start with a keyword are not directives
        return directive && !/\s/.test(directive.value)
          ? { raw, key: dialect.normalizeKey(directive.key), value: directive.value, commented: true, conditional }
          : { raw, commented: true, conditional }
      }

      const directive = trimmed ? dialect.parse(trimmed) : null
      return directive
        ? { raw, key: dialect.normalizeKey(directive.key), value: directive.value, commented: false, conditional }
        : { raw, commented: false, conditional }
    })

    return new KeyValueConfig(dialect, lines, trailingNewline)
  }

  private activeGlobal(key: string): ConfigLine[] {
    const normalized = this.dialect.normalizeKey(key)
    return this.lines.filter(l => l.key === normalized && !l.commented && !l.conditional)
  }

  /** Effective global value of a key, honouring the dialect's precedence */
  get(key: string): string | undefined {
    const matches = this.activeGlobal(key)
    const line = this.dialect.precedence === 'first' ? matches[0] : matches[matches.length - 1]
    return line?.value
  }

  has(key: string): boolean {
    return this.activeGlobal(key).length > 0
  }

  set(key: string, value: string): SetOutcome {
    const formatted = this.dialect.format(key, value)
    const active = this.activeGlobal(key)

    if (active.length > 0) {
      if (active.every(l => l.value === value)) return 'unchanged'
      for (const line of active) {
        line.raw = formatted
        line.value = value
      }
      return 'replaced'
    }

    const normalized = this.dialect.normalizeKey(key)
    const commented = this.lines.find(l => l.key === normalized && l.commented && !l.conditional)
    if (commented) {
      commented.raw = formatted
      commented.value = value
      commented.commented = false
      return 'uncommented'
    }

    const entry: ConfigLine = { raw: formatted, key: normalized, value, commented: false, conditional: false }
    const sectionIndex = this.lines.findIndex(l => l.conditional)
    if (sectionIndex === -1) {
      this.lines.push(entry)
    } else {
      this.lines.splice(sectionIndex, 0, entry)
    }
    return 'inserted'
  }

  toString(): string {
    const body = this.lines.map(l => l.raw).join('\n')
    if (this.lines.length === 0) return ''
    return this.trailingNewline ? `${body}\n` : body
  }
}
