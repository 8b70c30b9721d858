import type { Redis } from "ioredis";

// One hash per (scope, subject). A row from an older window is replaced in the
// same script that checks it; a row from a newer window (written by an
// instance whose clock runs ahead) is kept.
const windowCheckLua = `
local key = KEYS[1]
local limit = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local now_ms = tonumber(ARGV[3])
local grace_ms = tonumber(ARGV[4])

local window_start = now_ms - (now_ms % window_ms)
local state = redis.call("HMGET", key, "window_start", "window_ms", "count")
local stored_start = tonumber(state[1])
local stored_window = tonumber(state[2])
local count = 0

if stored_start ~= nil and stored_window == window_ms and stored_start >= window_start then
  window_start = stored_start
  count = tonumber(state[3]) or 0
end

local allowed = 0
if count < limit then
  count = count + 1
  allowed = 1
end

redis.call("HSET", key, "window_start", window_start, "window_ms", window_ms, "count", count, "limit", limit)

local reset_ms = window_start + window_ms - now_ms
if reset_ms < 1 then
  reset_ms = 1
end
redis.call("PEXPIRE", key, reset_ms + grace_ms)

return { allowed, count, limit, reset_ms, window_start }
`;

type ScriptName = "window_check";

const scriptMap: Record<ScriptName, string> = {
  window_check: windowCheckLua
};

function toIntegerReply(reply: unknown): number[] {
  if (!Array.isArray(reply)) {
    throw new Error("Unexpected Lua reply: expected an array");
  }

  return reply.map((value: unknown) => {
    const parsed = typeof value === "number" ? value : Number(value);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Unexpected Lua reply element: ${String(value)}`);
    }
    return parsed;
  });
}

export class RedisScriptManager {
  private readonly shas = new Map<ScriptName, string>();

  constructor(private readonly redis: Redis) {}

  async loadScripts(): Promise<void> {
    for (const [name, script] of Object.entries(scriptMap) as Array<[ScriptName, string]>) {
      const sha: unknown = await this.redis.script("LOAD", script);
      if (typeof sha !== "string") {
        throw new Error(`SCRIPT LOAD returned no sha for ${name}`);
      }
      this.shas.set(name, sha);
    }
  }

  async evalScript(name: ScriptName, keys: string[], args: Array<string | number>): Promise<number[]> {
    const sha = this.shas.get(name);
    const normalizedArgs = args.map((value) => String(value));

    if (!sha) {
      await this.loadScripts();
      return this.evalScript(name, keys, normalizedArgs);
    }

    try {
      const reply: unknown = await this.redis.evalsha(sha, keys.length, ...keys, ...normalizedArgs);
      return toIntegerReply(reply);
    } catch (error) {
      const message = error instanceof Error ? error.message : "";
      if (message.includes("NOSCRIPT")) {
        await this.loadScripts();
        return this.evalScript(name, keys, normalizedArgs);
      }
      throw error;
    }
  }
}
