type Reply = [Error | null, unknown];

/**
 * Just enough of the ioredis surface for the last-visit backend,
 * kept in process so tests never need a Redis server.
 */
export class FakeRedis {
  readonly strings = new Map<string, string>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly sets = new Map<string, Set<string>>();
  seconds = 1_700_000_000;
  pipelineExecs = 0;
  multiExecs = 0;

  reset() {
    this.strings.clear();
    this.hashes.clear();
    this.sets.clear();
    this.pipelineExecs = 0;
    this.multiExecs = 0;
  }

  // ---------- seeding helpers ----------
  seedHash(key: string, fields: Record<string, string>) {
    this.hashes.set(key, new Map(Object.entries(fields)));
  }

  seedSet(key: string, members: string[]) {
    this.sets.set(key, new Set(members));
  }

  hashOf(key: string): Record<string, string> {
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  // ---------- commands ----------
  async ping() {
    return 'PONG';
  }

  async time() {
    return [String(this.seconds), '250000'];
  }

  async get(key: string) {
    return this.strings.get(key) ?? null;
  }

  async hgetall(key: string) {
    return this.hashOf(key);
  }

  async hmget(key: string, ...fields: string[]) {
    return this.hmgetSync(key, fields);
  }

  async smembers(key: string) {
    return [...(this.sets.get(key) ?? [])];
  }

  async sismember(key: string, member: string) {
    return this.sets.get(key)?.has(member) ? 1 : 0;
  }

  pipeline() {
    const queue: Array<() => unknown> = [];
    const chain = {
      hgetall: (key: string) => {
        queue.push(() => this.hashOf(key));
        return chain;
      },
      smembers: (key: string) => {
        queue.push(() => [...(this.sets.get(key) ?? [])]);
        return chain;
      },
      exec: async (): Promise<Reply[]> => {
        this.pipelineExecs += 1;
        return queue.map((run) => [null, run()]);
      },
    };
    return chain;
  }

  multi() {
    const queue: Array<() => unknown> = [];
    const chain = {
      hset: (key: string, field: string, value: string) => {
        queue.push(() => {
          const hash = this.hashes.get(key) ?? new Map<string, string>();
          const added = hash.has(field) ? 0 : 1;
          hash.set(field, value);
          this.hashes.set(key, hash);
          return added;
        });
        return chain;
      },
      exec: async (): Promise<Reply[]> => {
        this.multiExecs += 1;
        return queue.map((run) => [null, run()]);
      },
    };
    return chain;
  }

  private hmgetSync(key: string, fields: string[]) {
    const hash = this.hashes.get(key);
    return fields.map((field) => hash?.get(field) ?? null);
  }
}

export const fakeRedis = new FakeRedis();
