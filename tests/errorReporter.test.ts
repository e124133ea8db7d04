import { CommandContext } from '../src/context'
import { buildErrorReport, chunkTraceback, createErrorReporter, PostJson } from '../src/errorReporter'

const ctx: CommandContext = { userId: 'u1', chatId: 'g1', chatType: 'group' }

describe('chunkTraceback', () => {
  test('short trace fits one field', () => {
    expect(chunkTraceback('abc')).toEqual([{ name: 'Traceback', value: '```text\nabc\n```' }])
  })

  test('long trace is split into fields of at most 1024 characters', () => {
    const fields = chunkTraceback('x'.repeat(2030))
    expect(fields.map(f => f.name)).toEqual(['Traceback', 'Traceback (cont. 1)', 'Traceback (cont. 2)'])
    expect(fields.map(f => f.value.length)).toEqual([1024, 1024, 6 + 12])
  })
})

describe('buildErrorReport', () => {
  test('without context or stack', () => {
    expect(buildErrorReport('/r', 'boom')).toEqual({
      title: 'Error in /r',
      user: 'unknown',
      chat: 'unknown',
      error: 'boom',
      fields: [{ name: 'Traceback', value: '```text\nNo traceback available\n```' }],
    })
  })
})

describe('createErrorReporter', () => {
  test('is disabled without a webhook', async () => {
    const report = createErrorReporter()
    expect(await report('/r', new Error('boom'), ctx)).toEqual({ ok: false, reason: 'disabled' })
  })

  test('posts the report as JSON', async () => {
    const bodies: string[] = []
    const post: PostJson = async (_url, body) => {
      bodies.push(body)
      return 204
    }
    const report = createErrorReporter({ webhookUrl: 'https://hooks.example.test/errors', post })

    expect(await report('/ed', new Error('boom'), ctx)).toEqual({ ok: true })
    const sent: unknown = JSON.parse(bodies[0])
    expect(sent).toMatchObject({ title: 'Error in /ed', user: 'u1', chat: 'g1', error: 'boom' })
  })

  test('reports rejected and failed deliveries', async () => {
    const rejected = createErrorReporter({ webhookUrl: 'https://hooks.example.test/errors', post: async () => 500 })
    expect(await rejected('/r', new Error('boom'))).toEqual({ ok: false, reason: 'status 500' })

    const failing = createErrorReporter({
      webhookUrl: 'https://hooks.example.test/errors',
      post: async () => {
        throw new Error('timeout')
      },
    })
    expect(await failing('/r', new Error('boom'))).toEqual({ ok: false, reason: 'timeout' })
  })
})
