import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';

export type FetchHandler = (req: Request) => Promise<Response>;

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function toHeaders(req: IncomingMessage): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((entry) => headers.append(key, entry));
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
}

export async function toWebRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const method = (req.method ?? 'GET').toUpperCase();
  const url = new URL(req.url ?? '/', origin);
  const hasBody = method !== 'GET' && method !== 'HEAD';
  const body = hasBody ? await readBody(req) : null;

  return new Request(url, {
    method,
    headers: toHeaders(req),
    body: body && body.length > 0 ? body.toString('utf8') : undefined,
  });
}

export async function writeWebResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  const payload = Buffer.from(await response.arrayBuffer());
  res.end(payload);
}

/**
 * HTTP server that turns each request into a Web `Request`, runs it through
 * the handler and writes the `Response` back.
 */
export function createHttpServer(handle: FetchHandler, origin: string): Server {
  return createServer((req, res) => {
    const started = Date.now();
    toWebRequest(req, origin)
      .then(handle)
      .then((response) => writeWebResponse(res, response))
      .then(() => {
        console.log(`${req.method} ${req.url} ${res.statusCode} ${Date.now() - started}ms`);
      })
      .catch((error: unknown) => {
        console.error('Unhandled request error:', { method: req.method, url: req.url, error });
        if (res.headersSent) {
          res.end();
          return;
        }
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
        res.end(JSON.stringify({ error: 'Internal server error' }));
      });
  });
}
