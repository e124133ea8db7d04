import { shutdown } from '../src/bot'
import { storeQueue } from '../src/queues'

describe('shutdown wrapper', () => {
  test('closes rl and waits for pending store writes without exiting when skipExit=true', async () => {
    const called: string[] = []
    const rl = {
      close: () => {
        called.push('rl.close')
      },
    }
    storeQueue.push(async () => {
      await new Promise(r => setTimeout(r, 10))
      called.push('store write')
    })

    await shutdown(rl, { skipExit: true })

    expect(called).toEqual(['rl.close', 'store write'])
  })
})
