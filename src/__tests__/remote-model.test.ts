import assert from "node:assert/strict";
import test from "node:test";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { extractWaveform } from "../model/output.js";
import { RemoteModelLoader, type RemoteModelOptions } from "../providers/model/remote.js";
import { closeServer, listen, silentLogger } from "./helpers.js";

type EngineRequest = {
  path: string;
  authorization?: string;
  body?: Record<string, unknown>;
};

async function readJson(req: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return JSON.parse(Buffer.concat(chunks).toString("utf8")) as Record<string, unknown>;
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

async function startEngine(opts: {
  readyAfterProbes?: number;
  generate?: (body: Record<string, unknown>) => { code: number; payload: unknown };
}) {
  const requests: EngineRequest[] = [];
  let probes = 0;
  const server = createServer(async (req, res) => {
    const authorization = req.headers.authorization;
    if (req.method === "GET" && req.url === "/health") {
      probes += 1;
      requests.push({ path: "/health", authorization });
      writeJson(res, 200, { model_loaded: probes > (opts.readyAfterProbes ?? 0), device: "cpu" });
      return;
    }
    if (req.method === "POST" && req.url === "/generate") {
      const body = await readJson(req);
      requests.push({ path: "/generate", authorization, body });
      const reply = opts.generate?.(body) ?? { code: 200, payload: { output: [] } };
      writeJson(res, reply.code, reply.payload);
      return;
    }
    writeJson(res, 404, { error: "not_found" });
  });
  server.listen(0);
  const baseUrl = await listen(server);
  return { server, baseUrl, requests };
}

function options(endpointUrl: string, overrides: Partial<RemoteModelOptions> = {}): RemoteModelOptions {
  return {
    endpointUrl,
    apiKey: "test-key",
    modelId: "facebook/seamless-m4t-v2-large",
    numBeams: 1,
    maxNewTokens: 256,
    loadTimeoutMs: 1000,
    pollIntervalMs: 10,
    logger: silentLogger(),
    ...overrides,
  };
}

test("load polls the engine until the model reports loaded", async () => {
  const engine = await startEngine({ readyAfterProbes: 2 });
  try {
    const model = await new RemoteModelLoader(options(`${engine.baseUrl}/`)).load();

    assert.equal(model.name, "remote:facebook/seamless-m4t-v2-large");
    assert.equal(engine.requests.length, 3);
    assert.ok(engine.requests.every((r) => r.path === "/health" && r.authorization === "Bearer test-key"));
  } finally {
    await closeServer(engine.server);
  }
});

test("load gives up once the timeout passes", async () => {
  const engine = await startEngine({ readyAfterProbes: 1_000 });
  try {
    await assert.rejects(
      new RemoteModelLoader(options(engine.baseUrl, { loadTimeoutMs: 50 })).load(),
      /not ready after 50 ms: model still loading/,
    );
  } finally {
    await closeServer(engine.server);
  }
});

test("generate posts f32le audio with the language pair", async () => {
  const engine = await startEngine({
    generate: () => ({ code: 200, payload: { output: ["bonjour", [0.5, -0.5]] } }),
  });
  try {
    const model = await new RemoteModelLoader(options(engine.baseUrl)).load();
    const output = await model.generate(Float32Array.from([0.25, -1]), "eng", "fra");

    assert.deepEqual(output, ["bonjour", [0.5, -0.5]]);
    const call = engine.requests.find((r) => r.path === "/generate");
    assert.equal(call?.body?.model, "facebook/seamless-m4t-v2-large");
    assert.equal(call?.body?.audio_format, "f32le");
    assert.equal(call?.body?.sampling_rate, 16000);
    assert.equal(call?.body?.src_lang, "eng");
    assert.equal(call?.body?.tgt_lang, "fra");
    assert.equal(call?.body?.num_beams, 1);
    assert.equal(call?.body?.max_new_tokens, 256);

    const audio = Buffer.from(String(call?.body?.audio), "base64");
    assert.equal(audio.length, 8);
    assert.equal(audio.readFloatLE(0), 0.25);
    assert.equal(audio.readFloatLE(4), -1);
  } finally {
    await closeServer(engine.server);
  }
});

test("token ids and a batched waveform from the engine resolve to the audio", async () => {
  const engine = await startEngine({
    generate: () => ({ code: 200, payload: { output: [[101, 7, 42], [[0.5, -0.5, 0.25]]] } }),
  });
  try {
    const model = await new RemoteModelLoader(options(engine.baseUrl)).load();
    const output = await model.generate(new Float32Array(4), "eng", "fra");

    assert.deepEqual(Array.from(extractWaveform(output) ?? []), [0.5, -0.5, 0.25]);
  } finally {
    await closeServer(engine.server);
  }
});

test("generate surfaces engine failures", async () => {
  const replies = [
    { code: 500, payload: { detail: "CUDA out of memory" } },
    { code: 200, payload: { error: "unsupported tgt_lang" } },
    { code: 200, payload: { output: { waveform: "not numbers" } } },
  ];
  let next = 0;
  const engine = await startEngine({
    generate: () => {
      const reply = replies[next] ?? { code: 200, payload: {} };
      next += 1;
      return reply;
    },
  });
  try {
    const model = await new RemoteModelLoader(options(engine.baseUrl)).load();
    const input = new Float32Array(4);

    await assert.rejects(model.generate(input, "eng", "fra"), /engine responded 500: .*CUDA out of memory/);
    await assert.rejects(model.generate(input, "eng", "fra"), /engine error: unsupported tgt_lang/);
    await assert.rejects(model.generate(input, "eng", "fra"), /malformed output payload/);
  } finally {
    await closeServer(engine.server);
  }
});
