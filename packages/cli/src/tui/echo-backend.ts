import type { InferenceBackend, InferenceRequest } from '@bastion/kernel'

/**
 * EchoBackend — an on-device stand-in for a model. Repeats the prompt and
 * says how much context reached it, which is enough to watch the guard
 * decide what a model would see.
 */
export class EchoBackend implements InferenceBackend {
  readonly remote = false

  async complete(request: InferenceRequest): Promise<string> {
    const { snippets, withheld } = request.context
    return `(echo) ${request.prompt} [context: ${snippets.length} shared, ${withheld.length} withheld]`
  }
}
