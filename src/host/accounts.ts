/**
 * passwd(5) and shadow(5) parsing
 */

export interface PasswdEntry {
  user: string
  uid: number
  gid: number
  home: string
  shell: string
}

export interface ShadowEntry {
  user: string
  /** Encrypted password field; "" means no password at all */
  hash: string
}

function splitRecords(text: string): string[][] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'))
    .map(line => line.split(':'))
}

export function parsePasswd(text: string): PasswdEntry[] {
  return splitRecords(text)
    .filter(fields => fields.length >= 7)
    .map(([user = '', , uid = '', gid = '', , home = '', shell = '']) => ({
      user,
      uid: Number(uid),
      gid: Number(gid),
      home,
      shell,
    }))
}

export function parseShadow(text: string): ShadowEntry[] {
  return splitRecords(text)
    .filter(fields => fields.length >= 2)
    .map(([user = '', hash = '']) => ({ user, hash }))
}

/** passwd -l prefixes "!", system accounts usually carry "*" or "!" */
export function isLocked(hash: string): boolean {
  return hash.startsWith('!') || hash.startsWith('*')
}
