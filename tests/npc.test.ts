import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { TemplateNotFoundError } from '../src/errors'
import NpcRegistry, { NpcCreateArgs, parseNpcCreateArgs } from '../src/npc'

function createArgs(overrides: Partial<NpcCreateArgs>): NpcCreateArgs {
  return { name: 'Nobody', alias: null, template: null, isUnique: false, shared: false, ...overrides }
}

describe('parseNpcCreateArgs', () => {
  test('name only', () => {
    expect(parseNpcCreateArgs('Sally the Sniper')).toEqual({
      name: 'Sally the Sniper',
      alias: null,
      template: null,
      isUnique: false,
      shared: false,
    })
  })

  test('alias and shared flag', () => {
    expect(parseNpcCreateArgs('Big Bob -a bob_template -s')).toEqual({
      name: 'Big Bob',
      alias: 'bob_template',
      template: null,
      isUnique: false,
      shared: true,
    })
  })

  test('quoted name with template and unique flag', () => {
    expect(parseNpcCreateArgs('"The Razor Ganger" -t razor_template -u')).toEqual({
      name: 'The Razor Ganger',
      alias: null,
      template: 'razor_template',
      isUnique: true,
      shared: false,
    })
  })

  test('options in any order', () => {
    expect(parseNpcCreateArgs("'Cyber Samurai' -u -a cybsam")).toEqual({
      name: 'Cyber Samurai',
      alias: 'cybsam',
      template: null,
      isUnique: true,
      shared: false,
    })
  })

  test('flags alone leave an empty name', () => {
    expect(parseNpcCreateArgs('-u -s').name).toBe('')
  })
})

describe('NpcRegistry', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'npcs-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  test('loads the bundled template seeds', async () => {
    const registry = new NpcRegistry({ templatesFile: path.join(__dirname, '..', 'templates', 'npc-templates.json') })
    await registry.load()
    expect(registry.listTemplates().map(t => t.alias)).toEqual(['ganger', 'corpsec', 'cop'])
  })

  test('seeding skips aliases that already name a template', async () => {
    const registry = new NpcRegistry()
    expect(await registry.seedTemplates([{ name: 'Ganger', alias: 'ganger' }])).toBe(1)
    expect(await registry.seedTemplates([{ name: 'Other Ganger', alias: 'ganger' }, { name: 'Mage', alias: 'mage' }])).toBe(1)
    expect(registry.listTemplates().map(t => t.name)).toEqual(['Ganger', 'Mage'])
  })

  test('clones edition and stats from the template', async () => {
    const registry = new NpcRegistry()
    await registry.seedTemplates([{ name: 'Ganger', alias: 'ganger', edition: 'SR6', stats: { body: 4 } }])
    const id = await registry.addNpc('u1', 'g1', createArgs({ name: 'Razor', template: 'ganger' }))
    expect(id).toBe(2)

    const npc = registry.get(id)
    expect(npc).toMatchObject({ name: 'Razor', template: false, edition: 'SR6', stats: { body: 4 } })
    expect(npc?.stats).not.toBe(registry.findTemplate('ganger')?.stats)
  })

  test('unknown template throws', async () => {
    const registry = new NpcRegistry()
    await expect(registry.addNpc('u1', null, createArgs({ template: 'nope' }))).rejects.toThrow(TemplateNotFoundError)
  })

  test('never reuses an id when the stored nextId is stale', async () => {
    const file = path.join(dir, 'npcs.json')
    const record = {
      id: 5,
      ownerUserId: 'u1',
      ownerChatId: null,
      name: 'Sally',
      alias: null,
      template: false,
      isUnique: false,
      shared: false,
      edition: null,
      stats: {},
    }
    await fs.writeFile(file, JSON.stringify({ nextId: 1, npcs: [record] }), 'utf8')

    const registry = new NpcRegistry({ file })
    await registry.load()
    expect(await registry.addNpc('u1', null, createArgs({ name: 'Bob' }))).toBe(6)
  })

  test('persists to and reloads from its file', async () => {
    const file = path.join(dir, 'npcs.json')
    const registry = new NpcRegistry({ file })
    await registry.addNpc('u1', null, createArgs({ name: 'Sally', isUnique: true }))
    await registry.addNpc('u1', 'g1', createArgs({ name: 'Bob', alias: 'bob' }))

    const reloaded = new NpcRegistry({ file })
    await reloaded.load()
    expect(reloaded.get(1)).toMatchObject({ name: 'Sally', isUnique: true, ownerChatId: null })
    expect(reloaded.get(2)).toMatchObject({ name: 'Bob', alias: 'bob', ownerChatId: 'g1' })
    expect(await reloaded.addNpc('u2', null, createArgs({}))).toBe(3)
  })
})
