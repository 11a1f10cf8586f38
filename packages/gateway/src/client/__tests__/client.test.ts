import { describe, it, expect, beforeEach } from '../../__tests__/vitest-effection.ts'
import {
  hang,
  json,
  ndjson,
  refusingFetch,
  text,
  useMockModelServer,
  type MockModelServer,
} from '../../__tests__/mock-model-server.ts'
import { createGatewayConfig, type GatewayConfigInput } from '../../config/index.ts'
import { createMessage } from '../../context-window/index.ts'
import { createGatewayClient, type GatewayClient } from '../client.ts'
import type { PullProgressEvent } from '../wire.ts'

describe('createGatewayClient', () => {
  let server: MockModelServer
  let client: GatewayClient

  function clientWith(timeouts: NonNullable<GatewayConfigInput['timeouts']>): GatewayClient {
    return createGatewayClient(
      createGatewayConfig({ endpoint: { baseUrl: server.url, model: 'llama3' }, timeouts })
    )
  }

  beforeEach(function* () {
    server = yield* useMockModelServer()
    client = clientWith({})
  })

  describe('checkConnection', () => {
    it('is true for a 200 with a JSON body', function* () {
      server.route('GET', '/api/tags', json({ models: [] }))

      expect(yield* client.checkConnection()).toBe(true)
      expect(server.requests.map((request) => request.path)).toEqual(['/api/tags'])
    })

    it('is false for a non-200 status', function* () {
      server.route('GET', '/api/tags', json({ error: 'busy' }, 503))

      expect(yield* client.checkConnection()).toBe(false)
    })

    it('is false for a 200 without a JSON body', function* () {
      server.route('GET', '/api/tags', text('<html>proxy</html>'))

      expect(yield* client.checkConnection()).toBe(false)
    })

    it('is false when the server does not answer in time', function* () {
      server.route('GET', '/api/tags', hang())

      expect(yield* clientWith({ healthCheck: 50 }).checkConnection()).toBe(false)
    })

    it('is false when nothing is listening', function* () {
      const offline = createGatewayClient(createGatewayConfig(), { fetch: refusingFetch })

      expect(yield* offline.checkConnection()).toBe(false)
    })
  })

  describe('listModels', () => {
    it('returns the installed models', function* () {
      server.route('GET', '/api/tags', json({ models: [{ name: 'llama3:latest', size: 4_700_000_000 }] }))

      const list = yield* client.listModels()

      expect(list).toEqual({ models: [{ name: 'llama3:latest', size: 4_700_000_000 }] })
    })

    it('returns undefined on a server error', function* () {
      server.route('GET', '/api/tags', text('boom', 500))

      expect(yield* client.listModels()).toBeUndefined()
    })

    it('returns undefined when the body has no model list', function* () {
      server.route('GET', '/api/tags', json({ tags: [] }))

      expect(yield* client.listModels()).toBeUndefined()
    })
  })

  describe('hasModel', () => {
    beforeEach(function* () {
      server.route('GET', '/api/tags', json({ models: [{ name: 'llama3:latest' }, { name: 'mistral:7b' }] }))
    })

    it('matches the configured model under its latest tag', function* () {
      expect(yield* client.hasModel()).toBe(true)
    })

    it('matches an exact tag', function* () {
      expect(yield* client.hasModel('mistral:7b')).toBe(true)
    })

    it('does not match a different tag', function* () {
      expect(yield* client.hasModel('mistral')).toBe(false)
    })
  })

  describe('generateResponse', () => {
    it('posts the prompt with the sampling options and trims the reply', function* () {
      server.route('POST', '/api/generate', json({ response: '  Hello there \n', eval_duration: 1_500_000_000 }))

      const result = yield* client.generateResponse('hi')

      expect(result).toEqual({ type: 'success', text: 'Hello there', metadata: { evalDurationNs: 1_500_000_000 } })
      expect(server.requests[0]?.body).toEqual({
        model: 'llama3',
        prompt: 'hi',
        stream: false,
        options: { temperature: 0.7, top_p: 0.9, max_tokens: 2000, stop: [] },
      })
    })

    it('folds the history into the prompt', function* () {
      server.route('POST', '/api/generate', json({ response: 'fine' }))
      const history = [createMessage('user', 'hi'), createMessage('assistant', 'hello')]

      yield* client.generateResponse('how are you', { history })

      expect(server.requests[0]?.body).toMatchObject({
        prompt: 'Human: hi\nAssistant: hello\nHuman: how are you\nAssistant:',
      })
    })

    it('sends the prompt unchanged for an empty history', function* () {
      server.route('POST', '/api/generate', json({ response: 'fine' }))

      yield* client.generateResponse('hello', { history: [] })

      expect(server.requests[0]?.body).toMatchObject({ prompt: 'hello' })
    })

    it('applies per-call sampling overrides', function* () {
      server.route('POST', '/api/generate', json({ response: 'ok' }))

      yield* client.generateResponse('hi', { sampling: { temperature: 0.1, stop: ['\n\n'] } })

      expect(server.requests[0]?.body).toMatchObject({
        options: { temperature: 0.1, top_p: 0.9, max_tokens: 2000, stop: ['\n\n'] },
      })
    })

    it('classifies a non-200 status as a server failure', function* () {
      server.route('POST', '/api/generate', json({ error: 'model not found' }, 404))

      expect(yield* client.generateResponse('hi')).toEqual({
        type: 'failure',
        kind: 'server',
        detail: 'HTTP 404',
        status: 404,
      })
    })

    it('classifies a body without a response field as malformed', function* () {
      server.route('POST', '/api/generate', json({ done: true }))

      expect(yield* client.generateResponse('hi')).toEqual({
        type: 'failure',
        kind: 'malformed_response',
        detail: 'Response is missing the "response" field',
        status: 200,
      })
    })

    it('keeps the reply when the duration is not a usable number', function* () {
      server.route('POST', '/api/generate', json({ response: 'ok', eval_duration: null }))

      expect(yield* client.generateResponse('hi')).toEqual({ type: 'success', text: 'ok', metadata: {} })
    })

    it('classifies a non-JSON body as malformed', function* () {
      server.route('POST', '/api/generate', text('not json'))

      expect(yield* client.generateResponse('hi')).toEqual({
        type: 'failure',
        kind: 'malformed_response',
        detail: 'Response body is not JSON',
        status: 200,
      })
    })

    it('classifies an expired request as a timeout', function* () {
      server.route('POST', '/api/generate', hang())

      const result = yield* clientWith({ generation: 50 }).generateResponse('hi')

      expect(result).toEqual({
        type: 'failure',
        kind: 'timeout',
        detail: 'POST /api/generate timed out after 50ms; the model may still be working on a long answer',
      })
    })

    it('classifies an unreachable server as a connection failure', function* () {
      const offline = createGatewayClient(createGatewayConfig(), { fetch: refusingFetch })

      const result = yield* offline.generateResponse('hi')

      expect(result.type).toBe('failure')
      if (result.type === 'failure') {
        expect(result.kind).toBe('connection')
        expect(result.status).toBeUndefined()
      }
    })
  })

  describe('chat', () => {
    it('posts the messages and returns the reply content', function* () {
      server.route('POST', '/api/chat', json({ message: { role: 'assistant', content: ' sure \n' } }))

      const result = yield* client.chat([
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hi' },
      ])

      expect(result).toEqual({ type: 'success', text: 'sure', metadata: {} })
      expect(server.requests[0]?.body).toEqual({
        model: 'llama3',
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
        stream: false,
        options: { temperature: 0.7, top_p: 0.9, max_tokens: 2000, stop: [] },
      })
    })

    it('keeps the reply when the duration is negative', function* () {
      server.route('POST', '/api/chat', json({ message: { content: 'ok' }, eval_duration: -5 }))

      expect(yield* client.chat([{ role: 'user', content: 'hi' }])).toEqual({
        type: 'success',
        text: 'ok',
        metadata: {},
      })
    })

    it('classifies a reply without message content as malformed', function* () {
      server.route('POST', '/api/chat', json({ message: { role: 'assistant' } }))

      expect(yield* client.chat([{ role: 'user', content: 'hi' }])).toEqual({
        type: 'failure',
        kind: 'malformed_response',
        detail: 'Response is missing the "message.content" field',
        status: 200,
      })
    })
  })

  describe('pullModel', () => {
    it('forwards every status line in order and succeeds', function* () {
      server.route(
        'POST',
        '/api/pull',
        ndjson([
          { status: 'pulling manifest' },
          'garbage',
          { digest: 'sha256:abc' },
          { status: 'downloading', digest: 'sha256:abc', total: 100, completed: 50 },
          { status: 'success' },
        ])
      )
      const events: PullProgressEvent[] = []

      const pulled = yield* client.pullModel(undefined, { onProgress: (event) => events.push(event) })

      expect(pulled).toBe(true)
      expect(server.requests[0]?.body).toEqual({ name: 'llama3' })
      expect(events).toEqual([
        { status: 'pulling manifest' },
        { status: 'downloading', digest: 'sha256:abc', total: 100, completed: 50 },
        { status: 'success' },
      ])
    })

    it('pulls the named model', function* () {
      server.route('POST', '/api/pull', ndjson([{ status: 'success' }]))

      expect(yield* client.pullModel('mistral')).toBe(true)
      expect(server.requests[0]?.body).toEqual({ name: 'mistral' })
    })

    it('fails when the stream reports an error', function* () {
      server.route('POST', '/api/pull', ndjson([{ status: 'pulling manifest' }, { error: 'file does not exist' }]))
      const events: PullProgressEvent[] = []

      const pulled = yield* client.pullModel('nope', { onProgress: (event) => events.push(event) })

      expect(pulled).toBe(false)
      expect(events).toEqual([{ status: 'pulling manifest' }])
    })

    it('fails on a non-200 status without reporting progress', function* () {
      server.route('POST', '/api/pull', text('unauthorized', 401))
      const events: PullProgressEvent[] = []

      expect(yield* client.pullModel('llama3', { onProgress: (event) => events.push(event) })).toBe(false)
      expect(events).toEqual([])
    })

    it('fails when nothing is listening', function* () {
      const offline = createGatewayClient(createGatewayConfig(), { fetch: refusingFetch })

      expect(yield* offline.pullModel()).toBe(false)
    })
  })

  describe('getModelInfo', () => {
    it('returns the model metadata', function* () {
      server.route('POST', '/api/show', json({ modelfile: 'FROM llama3', parameters: 'stop "<|eot_id|>"' }))

      const info = yield* client.getModelInfo()

      expect(info).toEqual({ modelfile: 'FROM llama3', parameters: 'stop "<|eot_id|>"' })
      expect(server.requests[0]?.body).toEqual({ name: 'llama3' })
    })

    it('returns undefined for an unknown model', function* () {
      expect(yield* client.getModelInfo('missing')).toBeUndefined()
    })
  })
})
