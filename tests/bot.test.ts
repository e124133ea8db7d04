import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { PassThrough } from 'stream'
import { start } from '../src/bot'
import { HELP_TEXT } from '../src/messages'

async function waitFor(cond: () => boolean) {
  for (let i = 0; i < 200 && !cond(); i++) await new Promise(r => setTimeout(r, 10))
}

describe('console bot', () => {
  const origCwd = process.cwd()
  let dir: string

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'console-'))
    process.chdir(dir)
  })

  afterAll(async () => {
    process.chdir(origCwd)
    await fs.rm(dir, { recursive: true, force: true })
  })

  test('answers lines in the order they were read', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {})
    const input = new PassThrough()

    await start({ input, output: new PassThrough() })
    input.write('/ed 4\n/help\nhello\n')
    await waitFor(() => log.mock.calls.length >= 3)

    expect(log.mock.calls).toEqual([
      ['✅ Your edition is now set to SR4.'],
      [HELP_TEXT],
      ['Unknown command. Try /help'],
    ])
    log.mockRestore()
  })
})
