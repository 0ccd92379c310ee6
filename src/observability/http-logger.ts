import { randomUUID } from 'crypto'
import type { IncomingMessage, ServerResponse } from 'http'
import pinoHttp from 'pino-http'

export const REQUEST_ID_HEADER = 'x-request-id'

/** Reuses the caller's request id when present and echoes it back. */
export function requestId(req: IncomingMessage, res: ServerResponse): string {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID()
  res.setHeader(REQUEST_ID_HEADER, id)
  return id
}

export function createHttpLogger(level: string) {
  return pinoHttp({
    level,
    genReqId: requestId,
    autoLogging: { ignore: (req) => req.url?.startsWith('/health') ?? false },
  })
}
