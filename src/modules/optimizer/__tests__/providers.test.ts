import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  createGroqProvider,
  createOpenAiProvider,
  GeminiProvider,
  HuggingFaceProvider,
  OllamaProvider
} from '../ai/providers'
import {
  ProviderConnectionError,
  ProviderHttpError,
  ProviderResponseError,
  ProviderTimeoutError
} from '../../../errors'

vi.mock('../../../logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}))

const OPTIONS = { temperature: 0.5, maxTokens: 2000 }

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })

describe('AI providers', () => {
  let originalFetch: typeof global.fetch
  let fetchMock: ReturnType<typeof vi.fn>

  beforeEach(() => {
    originalFetch = global.fetch
    fetchMock = vi.fn()
    global.fetch = fetchMock
  })

  afterEach(() => {
    global.fetch = originalFetch
  })

  const requestAt = (index: number) => {
    const [url, init] = fetchMock.mock.calls[index]
    return { url: String(url), init, body: JSON.parse(String(init.body)) }
  }

  describe('OpenAI', () => {
    it('sends system and user messages with a bearer key', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '{"ok":true}' } }] }))

      const output = await createOpenAiProvider('test-secret').generate('system text', 'user text', OPTIONS)

      expect(output).toBe('{"ok":true}')
      const { url, init, body } = requestAt(0)
      expect(url).toBe('https://api.openai.com/v1/chat/completions')
      expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' })
      expect(body).toEqual({
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'system text' },
          { role: 'user', content: 'user text' }
        ],
        temperature: 0.5,
        max_tokens: 2000
      })
    })

    it('surfaces HTTP failures with status and body', async () => {
      fetchMock.mockResolvedValue(new Response('{"error":{"code":"insufficient_quota"}}', { status: 429 }))

      const error = await createOpenAiProvider('test-secret')
        .generate('s', 'u', OPTIONS)
        .catch((err: unknown) => err)

      expect(error).toBeInstanceOf(ProviderHttpError)
      expect(error).toMatchObject({ status: 429, provider: 'openai' })
    })

    it('rejects a reply without choices', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [] }))

      await expect(createOpenAiProvider('test-secret').generate('s', 'u', OPTIONS)).rejects.toBeInstanceOf(
        ProviderResponseError
      )
    })

    it('reports network failures as connection errors', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'))

      await expect(createOpenAiProvider('test-secret').generate('s', 'u', OPTIONS)).rejects.toThrow(
        new ProviderConnectionError('openai', 'fetch failed')
      )
    })

    it('reports aborted requests as timeouts', async () => {
      fetchMock.mockRejectedValue(new DOMException('This operation was aborted', 'AbortError'))

      await expect(createOpenAiProvider('test-secret').generate('s', 'u', OPTIONS)).rejects.toBeInstanceOf(
        ProviderTimeoutError
      )
    })
  })

  describe('Groq', () => {
    it('uses the OpenAI wire format on the Groq endpoint and honours a model override', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'hi' } }] }))

      await createGroqProvider('test-secret').generate('s', 'u', { ...OPTIONS, model: 'mixtral-8x7b' })

      const { url, body } = requestAt(0)
      expect(url).toBe('https://api.groq.com/openai/v1/chat/completions')
      expect(body.model).toBe('mixtral-8x7b')
    })
  })

  describe('Ollama', () => {
    it('joins the prompts and disables streaming', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ response: 'local output' }))

      const output = await new OllamaProvider('http://localhost:11434/', 'llama3.2').generate('sys', 'usr', OPTIONS)

      expect(output).toBe('local output')
      const { url, body } = requestAt(0)
      expect(url).toBe('http://localhost:11434/api/generate')
      expect(body).toEqual({
        model: 'llama3.2',
        prompt: 'sys\n\nusr',
        stream: false,
        options: { temperature: 0.5, num_predict: 2000 }
      })
    })
  })

  describe('Gemini', () => {
    const geminiReply = () => jsonResponse({ candidates: [{ content: { parts: [{ text: 'gemini output' }] } }] })

    it('posts contents and generation config with the key in the query', async () => {
      fetchMock.mockResolvedValue(geminiReply())

      const output = await new GeminiProvider('test-secret').generate('sys', 'usr', OPTIONS)

      expect(output).toBe('gemini output')
      const { url, body } = requestAt(0)
      expect(url).toBe(
        'https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent?key=test-secret'
      )
      expect(body).toEqual({
        contents: [{ parts: [{ text: 'sys\n\nusr' }] }],
        generationConfig: { temperature: 0.5, maxOutputTokens: 2000 }
      })
    })

    it('backs off on 429 and retries', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined)
      fetchMock
        .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
        .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
        .mockResolvedValueOnce(geminiReply())

      const output = await new GeminiProvider('test-secret', { sleep }).generate('s', 'u', OPTIONS)

      expect(output).toBe('gemini output')
      expect(sleep.mock.calls).toEqual([[30_000], [60_000]])
      expect(fetchMock).toHaveBeenCalledTimes(3)
    })

    it('gives up after three retries', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined)
      fetchMock.mockImplementation(() => Promise.resolve(new Response('slow down', { status: 429 })))

      await expect(new GeminiProvider('test-secret', { sleep }).generate('s', 'u', OPTIONS)).rejects.toMatchObject({
        status: 429
      })
      expect(sleep.mock.calls).toEqual([[30_000], [60_000], [120_000]])
      expect(fetchMock).toHaveBeenCalledTimes(4)
    })

    it('does not retry other failures', async () => {
      const sleep = vi.fn()
      fetchMock.mockResolvedValue(new Response('bad key', { status: 400 }))

      await expect(new GeminiProvider('test-secret', { sleep }).generate('s', 'u', OPTIONS)).rejects.toBeInstanceOf(
        ProviderHttpError
      )
      expect(sleep).not.toHaveBeenCalled()
    })
  })

  describe('Hugging Face', () => {
    it('caps new tokens and strips the echoed prompt', async () => {
      fetchMock.mockResolvedValue(jsonResponse([{ generated_text: 'sys\n\nusr  answer text ' }]))

      const output = await new HuggingFaceProvider('test-secret').generate('sys', 'usr', OPTIONS)

      expect(output).toBe('answer text')
      const { url, init, body } = requestAt(0)
      expect(url).toBe('https://api-inference.huggingface.co/models/mistralai/Mistral-7B-Instruct-v0.2')
      expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' })
      expect(body).toEqual({
        inputs: 'sys\n\nusr',
        parameters: { temperature: 0.5, max_new_tokens: 512 }
      })
    })

    it('returns non-list results as JSON text', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: 'Model is loading' }))

      const output = await new HuggingFaceProvider('test-secret').generate('s', 'u', OPTIONS)

      expect(output).toBe('{"error":"Model is loading"}')
    })
  })
})
