import { z } from 'zod'

/** Octal permission bits as written by chmod, e.g. "644" */
const octalMode = z.string().regex(/^[0-7]{3,4}$/, 'expected an octal mode such as "644"')

export const pathsConfigSchema = z.object({
  sshdConfig: z.string().default('/etc/ssh/sshd_config'),
  loginDefs: z.string().default('/etc/login.defs'),
  passwd: z.string().default('/etc/passwd'),
  shadow: z.string().default('/etc/shadow'),
  group: z.string().default('/etc/group'),
  sysctlConf: z.string().default('/etc/sysctl.conf'),
})

export const policyConfigSchema = z.object({
  /** Highest acceptable PASS_MAX_DAYS */
  passMaxDays: z.number().int().positive().default(90),
  /** Highest acceptable sshd MaxAuthTries */
  maxAuthTries: z.number().int().min(1).max(10).default(4),
})

export const criticalFileSchema = z.object({
  path: z.string(),
  /** Mode applied by remediation */
  mode: octalMode,
  /** Modes accepted as compliant (defaults to [mode]) */
  allowed: z.array(octalMode).optional(),
})

export const worldWritableConfigSchema = z.object({
  directories: z.array(z.string()).default(['/etc', '/usr', '/bin', '/sbin']),
  /** How many offending files to list in the report */
  limit: z.number().int().positive().default(10),
})

export const checksConfigSchema = z.object({
  /** Check ids to leave out of the registry */
  disabled: z.array(z.string()).default([]),
})

export const backupConfigSchema = z.object({
  /** Store backups here instead of next to the original file */
  directory: z.string().optional(),
})

export const DEFAULT_RISKY_SERVICES = ['telnet', 'rsh', 'rlogin', 'vsftpd', 'ftpd']

export const configSchema = z.object({
  paths: pathsConfigSchema.default({}),
  policy: policyConfigSchema.default({}),
  /** Defaults to passwd/shadow/group from `paths` */
  criticalFiles: z.array(criticalFileSchema).optional(),
  riskyServices: z.array(z.string()).default(DEFAULT_RISKY_SERVICES),
  worldWritable: worldWritableConfigSchema.default({}),
  checks: checksConfigSchema.default({}),
  backup: backupConfigSchema.default({}),
})

export type PathsConfig = z.infer<typeof pathsConfigSchema>
export type PolicyConfig = z.infer<typeof policyConfigSchema>
export type CriticalFileConfig = z.infer<typeof criticalFileSchema>
export type WorldWritableConfig = z.infer<typeof worldWritableConfigSchema>
export type BackupConfig = z.infer<typeof backupConfigSchema>
export type Config = z.infer<typeof configSchema>
