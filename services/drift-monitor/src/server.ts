import http from 'http';
import type { Registry } from 'prom-client';
import { CycleInProgressError, InvalidToolInputError, ReferenceDataError, toError } from './errors';
import { log, type Logger } from './logger';
import type { ToolRegistry } from './tools';

type ServerDeps = { tools: ToolRegistry; metrics: Registry; logger?: Logger };

function send(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

type JsonBody = { ok: true; value: unknown } | { ok: false };

async function readJson(req: http.IncomingMessage): Promise<JsonBody> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  const text = Buffer.concat(chunks).toString('utf8');
  if (text.trim() === '') return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function parseCall(body: unknown): { tool: string; input: unknown } | null {
  if (typeof body !== 'object' || body === null || !('tool' in body) || typeof body.tool !== 'string') return null;
  return { tool: body.tool, input: 'input' in body ? body.input : undefined };
}

export function createServer({ tools, metrics, logger = log }: ServerDeps): http.Server {
  return http.createServer(async (req, res) => {
    try {
      if (req.method === 'GET' && req.url === '/health') { send(res, 200, { status: 'ok' }); return; }
      if (req.method === 'GET' && req.url === '/metrics') {
        const text = await metrics.metrics();
        res.writeHead(200, { 'content-type': metrics.contentType });
        res.end(text);
        return;
      }
      if (req.method === 'POST' && req.url === '/call') {
        const body = await readJson(req);
        if (!body.ok) { send(res, 400, { error: 'invalid_json' }); return; }
        const call = parseCall(body.value);
        if (!call) { send(res, 400, { error: 'invalid_request' }); return; }
        const tool = tools.get(call.tool);
        if (!tool) { send(res, 404, { error: 'tool_not_found' }); return; }
        send(res, 200, await tool.call(call.input));
        return;
      }
      send(res, 404, { error: 'not_found' });
    } catch (err) {
      if (err instanceof InvalidToolInputError) { send(res, 400, { error: err.code, issues: err.issues }); return; }
      if (err instanceof CycleInProgressError) { send(res, 409, { error: err.code }); return; }
      if (err instanceof ReferenceDataError) {
        send(res, 500, { error: 'reference_unavailable', message: err.message });
        return;
      }
      const e = toError(err);
      logger.error({ err: e }, 'unhandled error');
      send(res, 500, { error: 'internal_error', message: e.message });
    }
  });
}
