export type HttpResult = {
  ok: boolean;
  status: number;
  json?: unknown;
  text?: string;
};

function joinUrl(base: string, path: string) {
  const b = base.trim().replace(/\/+$/, '');
  const p = path.trim().replace(/^\/+/, '');
  return `${b}/${p}`;
}

async function readBody(r: Response): Promise<Pick<HttpResult, 'json' | 'text'>> {
  const ct = r.headers.get('content-type') ?? '';
  // An unreadable body is reported as missing; callers validate what they got.
  if (ct.includes('application/json')) return { json: await r.json().catch(() => null) };
  return { text: await r.text().catch(() => '') };
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(new Error('timeout')), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: ac.signal });
  } finally {
    clearTimeout(t);
  }
}

/** Request with an explicit bearer token. Network failures and timeouts reject. */
export async function httpAuthed(
  apiBaseUrl: string,
  path: string,
  init: RequestInit,
  opts: { accessToken: string | null; timeoutMs?: number },
): Promise<HttpResult> {
  if (!opts.accessToken) return { ok: false, status: 401, text: 'auth required' };
  const url = joinUrl(apiBaseUrl, path);

  const headers = new Headers(init.headers ?? {});
  headers.set('Authorization', `Bearer ${opts.accessToken}`);

  const r = await fetchWithTimeout(url, { ...init, headers }, opts.timeoutMs ?? 30_000);
  const body = await readBody(r);
  return { ok: r.ok, status: r.status, ...body };
}
