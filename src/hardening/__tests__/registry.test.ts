/**
 * Check registry tests
 */

import { describe, it, expect } from 'vitest'
import { configSchema } from '../../config/schema.js'
import { CATEGORY_ORDER, buildRegistry, findUnknownCheckIds, groupByCategory } from '../registry.js'

describe('buildRegistry', () => {
  it('lists checks grouped in category order', () => {
    const checks = buildRegistry(configSchema.parse({}))
    const categories = [...new Set(checks.map(c => c.category))]
    expect(categories).toEqual(CATEGORY_ORDER)
  })

  it('has unique ids', () => {
    const ids = buildRegistry(configSchema.parse({})).map(c => c.id)
    expect(new Set(ids).size).toBe(ids.length)
  })

  it('is frozen', () => {
    const checks = buildRegistry(configSchema.parse({}))
    expect(Object.isFrozen(checks)).toBe(true)
    expect(checks.every(c => Object.isFrozen(c))).toBe(true)
  })

  it('drops disabled checks', () => {
    const checks = buildRegistry(configSchema.parse({ checks: { disabled: ['system-updates', 'audit-daemon'] } }))
    expect(checks.map(c => c.id)).not.toContain('system-updates')
    expect(checks.map(c => c.id)).not.toContain('audit-daemon')
    expect(checks).toHaveLength(18)
  })

  it('creates one file check per configured critical file', () => {
    const checks = buildRegistry(
      configSchema.parse({ criticalFiles: [{ path: '/etc/gshadow', mode: '600' }, { path: '/etc/crontab', mode: '600' }] })
    )
    expect(checks.filter(c => c.category === 'file-permissions').map(c => c.id)).toEqual([
      'file-mode-gshadow',
      'file-mode-crontab',
      'world-writable-files',
    ])
  })

  it('keeps ids unique for critical files that share a basename', () => {
    const checks = buildRegistry(
      configSchema.parse({
        criticalFiles: [
          { path: '/srv/a/app.conf', mode: '644' },
          { path: '/srv/b/app.conf', mode: '600' },
          { path: '/etc/crontab', mode: '600' },
        ],
      })
    )
    expect(checks.filter(c => c.category === 'file-permissions').map(c => c.id)).toEqual([
      'file-mode-srv-a-app-conf',
      'file-mode-srv-b-app-conf',
      'file-mode-crontab',
      'world-writable-files',
    ])
  })

  it('rejects a critical file listed twice', () => {
    const config = configSchema.parse({
      criticalFiles: [
        { path: '/etc/crontab', mode: '600' },
        { path: '/etc/crontab', mode: '644' },
      ],
    })
    expect(() => buildRegistry(config)).toThrow('Invalid config: duplicate check id file-mode-crontab')
  })

  it('marks every remediation that writes as mutating', () => {
    for (const check of buildRegistry(configSchema.parse({}))) {
      if (check.targetFiles.length > 0) expect(check.mutates).toBe(true)
    }
  })
})

describe('findUnknownCheckIds', () => {
  it('reports disabled ids that match no check', () => {
    const config = configSchema.parse({ checks: { disabled: ['ssh-root-login', 'ssh-rot-login'] } })
    expect(findUnknownCheckIds(config)).toEqual(['ssh-rot-login'])
  })
})

describe('groupByCategory', () => {
  it('groups in order of first appearance', () => {
    const items = [
      { id: 'a', category: 'patching' as const },
      { id: 'b', category: 'remote-access' as const },
      { id: 'c', category: 'patching' as const },
    ]
    expect(groupByCategory(items)).toEqual([
      { category: 'patching', items: [items[0], items[2]] },
      { category: 'remote-access', items: [items[1]] },
    ])
  })
})
