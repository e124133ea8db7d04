import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { CommandContext } from '../src/context'
import EditionStore, { EditionChangedEvent } from '../src/editionStore'

const privateCtx: CommandContext = { userId: 'u1', chatId: 'u1', chatType: 'private' }
const groupCtx: CommandContext = { userId: 'u1', chatId: 'g1', chatType: 'supergroup' }

describe('EditionStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'editions-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  test('first read stores the default and emits an initialized event', async () => {
    const store = new EditionStore({ defaultEdition: 'SR4' })
    const events: EditionChangedEvent[] = []
    store.on('changed', (ev: EditionChangedEvent) => events.push(ev))

    expect(await store.getEdition(privateCtx)).toBe('SR4')
    expect(await store.getEdition(privateCtx)).toBe('SR4')
    expect(events).toEqual([{ scope: 'user', id: 'u1', edition: 'SR4', initialized: true }])
  })

  test('private chats use the user setting, groups the chat setting', async () => {
    const store = new EditionStore()
    await store.setEdition(groupCtx, 'SR6')
    expect(await store.getEdition(groupCtx)).toBe('SR6')
    expect(await store.getEdition(privateCtx)).toBe('SR5')

    await store.setEdition(privateCtx, 'SR4')
    expect(await store.getUserEdition('u1')).toBe('SR4')
    expect(await store.getChatEdition('g1')).toBe('SR6')
  })

  test('persists to and reloads from its file', async () => {
    const file = path.join(dir, 'settings.json')
    const store = new EditionStore({ file })
    await store.setEdition(privateCtx, 'SR4')
    await store.setEdition(groupCtx, 'SR6')

    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual({ users: { u1: 'SR4' }, chats: { g1: 'SR6' } })

    const reloaded = new EditionStore({ file })
    await reloaded.load()
    expect(await reloaded.getUserEdition('u1')).toBe('SR4')
    expect(await reloaded.getChatEdition('g1')).toBe('SR6')
  })

  test('ignores an invalid settings file', async () => {
    const file = path.join(dir, 'settings.json')
    await fs.writeFile(file, JSON.stringify({ users: { u1: 'SR9' } }), 'utf8')
    const store = new EditionStore({ file })
    await store.load()
    expect(await store.getUserEdition('u1')).toBe('SR5')
  })
})
