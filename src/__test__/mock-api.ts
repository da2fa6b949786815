export interface ApiCall {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: unknown;
}

interface StoredMemory {
  id: string;
  user_id: string;
  content: string;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at?: string;
}

interface StoredVersion {
  id: string;
  memory_id: string;
  version: number;
  content: string;
  change_type: string;
  created_at: string;
}

interface StoredLink {
  source_id: string;
  target_id: string;
  relationship_type: string;
}

type Failure =
  | { kind: 'status'; status: number; body: unknown; headers: Record<string, string> }
  | { kind: 'throw'; error: Error };

export const MOCK_BASE_URL = 'https://memphora.test/api/v1';
export const MOCK_TIMESTAMP = '2024-05-01T10:00:00Z';

const BASE_PATH = new URL(MOCK_BASE_URL).pathname;

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  if (body === null) return new Response(null, { status, headers });
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Match `/a/:/b` style patterns; returns the decoded `:` segments. */
function matchPath(pattern: string, seg: string[]): string[] | null {
  const parts = pattern.split('/').filter(Boolean);
  if (parts.length !== seg.length) return null;
  const params: string[] = [];
  for (let i = 0; i < parts.length; i++) {
    if (parts[i] === ':') params.push(decodeURIComponent(seg[i]));
    else if (parts[i] !== seg[i]) return null;
  }
  return params;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * In-process stand-in for the Memphora REST API, injected through the `fetch` option.
 * Search does case-insensitive term matching on content.
 */
export class MockMemphoraApi {
  readonly memories = new Map<string, StoredMemory>();
  readonly versions = new Map<string, StoredVersion[]>();
  readonly links: StoredLink[] = [];
  readonly extracted: unknown[] = [];
  readonly calls: ApiCall[] = [];
  private readonly failures: Failure[] = [];
  private nextId = 1;

  /** Queue an HTTP error for the next request. */
  failNext(status: number, body: unknown = null, headers: Record<string, string> = {}): this {
    this.failures.push({ kind: 'status', status, body, headers });
    return this;
  }

  /** Queue a network-level failure (fetch rejects) for the next request. */
  throwNext(error: Error = new TypeError('fetch failed')): this {
    this.failures.push({ kind: 'throw', error });
    return this;
  }

  seed(userId: string, content: string, metadata: Record<string, unknown> = {}): StoredMemory {
    const memory: StoredMemory = {
      id: `mem-${this.nextId++}`,
      user_id: userId,
      content,
      metadata,
      created_at: MOCK_TIMESTAMP,
    };
    this.memories.set(memory.id, memory);
    this.versions.set(memory.id, [
      { id: `${memory.id}-v1`, memory_id: memory.id, version: 1, content, change_type: 'create', created_at: MOCK_TIMESTAMP },
    ]);
    return memory;
  }

  readonly fetch: typeof fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    const path = url.pathname.startsWith(BASE_PATH) ? url.pathname.slice(BASE_PATH.length) : url.pathname;

    const query: Record<string, string> = {};
    url.searchParams.forEach((value, key) => {
      query[key] = value;
    });
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const raw = init?.body;
    const body: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw ?? null;

    this.calls.push({ method, path, query, headers, body });

    const failure = this.failures.shift();
    if (failure?.kind === 'throw') throw failure.error;
    if (failure?.kind === 'status') return json(failure.body, failure.status, failure.headers);

    return this.route(method, path.split('/').filter(Boolean), query, isRecord(body) ? body : {});
  };

  private route(method: string, seg: string[], query: Record<string, string>, body: Record<string, unknown>): Response {
    const on = (m: string, pattern: string): string[] | null => (m === method ? matchPath(pattern, seg) : null);
    let p: string[] | null;

    if (on('POST', '/memories')) {
      return json(this.seed(str(body.user_id), str(body.content), isRecord(body.metadata) ? body.metadata : {}));
    }

    if (on('POST', '/memories/search')) {
      const limit = typeof body.limit === 'number' ? body.limit : 5;
      return json(this.search(str(body.user_id), str(body.query)).slice(0, limit));
    }

    if (on('POST', '/memories/search/optimized')) {
      const limit = typeof body.max_memories === 'number' ? body.max_memories : 20;
      const hits = this.search(str(body.user_id), str(body.query)).slice(0, limit);
      return json({ context: hits.map((m) => m.content).join(' | '), memories: hits });
    }

    if ((p = on('GET', '/memories/user/:'))) {
      const userId = p[0];
      const limit = Number(query.limit ?? 100);
      return json([...this.memories.values()].filter((m) => m.user_id === userId).slice(0, limit));
    }

    if ((p = on('GET', '/memories/:'))) {
      const memory = this.memories.get(p[0]);
      return memory ? json(memory) : json({ detail: 'Memory not found' }, 404);
    }

    if ((p = on('PUT', '/memories/:'))) {
      const memory = this.memories.get(p[0]);
      if (!memory) return json({ detail: 'Memory not found' }, 404);
      if (typeof body.content === 'string') memory.content = body.content;
      if (isRecord(body.metadata)) memory.metadata = body.metadata;
      memory.updated_at = '2024-05-02T10:00:00Z';
      const history = this.versions.get(memory.id) ?? [];
      history.push({
        id: `${memory.id}-v${history.length + 1}`,
        memory_id: memory.id,
        version: history.length + 1,
        content: memory.content,
        change_type: 'update',
        created_at: memory.updated_at,
      });
      this.versions.set(memory.id, history);
      return json(memory);
    }

    if ((p = on('DELETE', '/memories/:'))) {
      if (!this.memories.delete(p[0])) return json({ detail: 'Memory not found' }, 404);
      return json(null, 204);
    }

    if ((p = on('GET', '/memories/:/versions'))) {
      if (!this.memories.has(p[0])) return json({ detail: 'Memory not found' }, 404);
      return json(this.versions.get(p[0]) ?? []);
    }

    if ((p = on('POST', '/memories/:/link'))) {
      const link: StoredLink = {
        source_id: p[0],
        target_id: query.target_id ?? '',
        relationship_type: query.relationship_type ?? 'related',
      };
      this.links.push(link);
      return json(link);
    }

    if ((p = on('GET', '/memories/:/path/:'))) {
      const [source, target] = p;
      const direct = this.links.some((l) => l.source_id === source && l.target_id === target);
      if (!direct) return json({ path: [], memories: [] });
      const memories = [source, target].flatMap((id) => {
        const m = this.memories.get(id);
        return m ? [m] : [];
      });
      return json({ path: [source, target], memories, length: 1 });
    }

    if (on('POST', '/conversations/extract')) {
      this.extracted.push(body.conversation);
      return json([]);
    }

    if (on('GET', '/conversations/:')) {
      return json({ detail: 'Conversation not found' }, 404);
    }

    if ((p = on('DELETE', '/users/:/memories'))) {
      let deleted = 0;
      for (const [id, m] of this.memories) {
        if (m.user_id === p[0]) {
          this.memories.delete(id);
          deleted++;
        }
      }
      return json({ deleted_count: deleted });
    }

    return json({ detail: 'Not Found' }, 404);
  }

  private search(userId: string, query: string): Array<StoredMemory & { score: number }> {
    const terms = query.toLowerCase().split(/\s+/).filter((t) => t.length > 0);
    return [...this.memories.values()]
      .filter((m) => m.user_id === userId)
      .map((m) => {
        const content = m.content.toLowerCase();
        const hits = terms.filter((t) => content.includes(t)).length;
        return { ...m, score: hits / Math.max(terms.length, 1) };
      })
      .filter((m) => m.score > 0)
      .sort((a, b) => b.score - a.score);
  }
}
