import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseConfig } from "../config.js";
import {
  FilenameDescriptionClient,
  VisionDescriptionClient,
  createDescriptionClient,
  describeFromFilename,
  parseDescriptionResponse,
} from "../describer.js";
import { PermanentServiceError, RateLimitedError, TransientServiceError } from "../errors.js";
import { asset } from "./helpers.js";

describe("parseDescriptionResponse", () => {
  it("reads the structured JSON fields", () => {
    const reply = JSON.stringify({
      description: "forest path",
      scene_type: "landscape",
      subjects: ["trees", "fog"],
      location: "black forest",
      action: "walking",
    });
    expect(parseDescriptionResponse(reply)).toEqual({
      description: "forest path",
      scene: "landscape",
      subjects: ["trees", "fog"],
      location: "black forest",
      action: "walking",
      analyzed: true,
    });
  });

  it("accepts a fenced reply and a single subject string", () => {
    const reply = '```json\n{"description": "harbor at dusk", "subjects": "boats"}\n```';
    expect(parseDescriptionResponse(reply)).toMatchObject({
      description: "harbor at dusk",
      subjects: ["boats"],
    });
  });

  it("falls back to the first words of plain text", () => {
    expect(parseDescriptionResponse("A quiet forest path in the morning fog.")).toEqual({
      description: "A quiet forest path in",
      subjects: [],
      analyzed: true,
    });
  });

  it("treats JSON without a description as plain text", () => {
    expect(parseDescriptionResponse('{"caption": "x"}').description).toBe("caption x");
  });

  it("returns untitled for an empty reply", () => {
    expect(parseDescriptionResponse("  ").description).toBe("untitled");
  });
});

describe("describeFromFilename", () => {
  it("turns the stem into words", () => {
    expect(describeFromFilename({ name: "IMG_2041-beach.jpg" })).toEqual({
      description: "IMG 2041 beach",
      subjects: [],
      analyzed: false,
    });
  });

  it("is what the offline client returns", async () => {
    const client = new FilenameDescriptionClient();
    const result = await client.describe(asset("/media", "dock__side.png"));
    expect(result.description).toBe("dock side");
  });
});

describe("VisionDescriptionClient", () => {
  const ai = parseConfig({}).ai;
  const photo = asset("/media", "pier.jpg");

  interface Call {
    url: string;
    authorization: string | null;
    body: unknown;
  }

  function fakeFetch(respond: () => Response, calls: Call[] = []): typeof fetch {
    return async (input, init) => {
      calls.push({
        url: String(input),
        authorization: new Headers(init?.headers).get("authorization"),
        body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
      });
      return respond();
    };
  }

  function completion(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
      status: 200,
      headers: { "content-type": "application/json" },
    });
  }

  function client(fetchImpl: typeof fetch, timeoutMs = ai.requestTimeoutMs) {
    return new VisionDescriptionClient({
      apiKey: "test-secret",
      ai: { ...ai, requestTimeoutMs: timeoutMs },
      fetch: fetchImpl,
      encodeImage: async () => "AAAA",
    });
  }

  it("posts the image and parses the reply", async () => {
    const calls: Call[] = [];
    const result = await client(
      fakeFetch(() => completion('{"description": "old pier"}'), calls),
    ).describe(photo);

    expect(result.description).toBe("old pier");
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("https://api.openai.com/v1/chat/completions");
    expect(calls[0].authorization).toBe("Bearer test-secret");
    expect(calls[0].body).toMatchObject({ model: "gpt-4o", max_tokens: 150, temperature: 0.7 });
  });

  it("maps 429 to RateLimitedError with the retry-after hint", async () => {
    const err = await client(
      fakeFetch(() => new Response("", { status: 429, headers: { "retry-after": "2" } })),
    )
      .describe(photo)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ retryAfterMs: 2000 });
  });

  it("maps 5xx to TransientServiceError", async () => {
    await expect(
      client(fakeFetch(() => new Response("", { status: 503 }))).describe(photo),
    ).rejects.toThrow(new TransientServiceError("Description service returned 503"));
  });

  it("maps other rejections to PermanentServiceError", async () => {
    await expect(
      client(fakeFetch(() => new Response("bad image", { status: 400 }))).describe(photo),
    ).rejects.toBeInstanceOf(PermanentServiceError);
  });

  it("fails permanently when the image cannot be decoded", async () => {
    const broken = new VisionDescriptionClient({
      apiKey: "test-secret",
      ai,
      fetch: fakeFetch(() => completion("{}")),
      encodeImage: async () => {
        throw new Error("unsupported image format");
      },
    });
    await expect(broken.describe(photo)).rejects.toThrow(
      "Cannot decode image pier.jpg: unsupported image format",
    );
  });

  it("fails permanently on a reply without content", async () => {
    await expect(
      client(
        fakeFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 })),
      ).describe(photo),
    ).rejects.toBeInstanceOf(PermanentServiceError);
  });

  it("describes a video from an extracted frame", async () => {
    const calls: Call[] = [];
    const extracted: string[] = [];
    const video = new VisionDescriptionClient({
      apiKey: "test-secret",
      ai,
      fetch: fakeFetch(() => completion('{"description": "drone over harbor"}'), calls),
      encodeImage: async () => "AAAA",
      extractFrame: async (videoPath) => {
        extracted.push(videoPath);
        return "BBBB";
      },
    });

    const result = await video.describe(asset("/media", "harbor_drone.mp4", { kind: "video" }));

    expect(result).toMatchObject({ description: "drone over harbor", analyzed: true });
    expect(extracted).toEqual([path.join("/media", "harbor_drone.mp4")]);
    expect(calls).toHaveLength(1);
    expect(JSON.stringify(calls[0].body)).toContain("data:image/jpeg;base64,BBBB");
  });

  it("falls back to the file name when no frame can be extracted", async () => {
    const calls: Call[] = [];
    const video = new VisionDescriptionClient({
      apiKey: "test-secret",
      ai,
      fetch: fakeFetch(() => completion("{}"), calls),
      encodeImage: async () => "AAAA",
      extractFrame: async () => {
        throw new Error("spawn ffmpeg ENOENT");
      },
    });

    const result = await video.describe(asset("/media", "harbor_drone.mp4", { kind: "video" }));

    expect(result).toEqual({ description: "harbor drone", subjects: [], analyzed: false });
    expect(calls).toHaveLength(0);
  });

  it("times out a hung request as a transient failure", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const err = await client(hanging, 20)
      .describe(photo)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientServiceError);
    expect(err).toMatchObject({
      message: "Description request for pier.jpg timed out after 20ms",
    });
  });

  it("maps network errors to TransientServiceError", async () => {
    const offline: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    await expect(client(offline).describe(photo)).rejects.toThrow(
      "Description request failed: fetch failed",
    );
  });
});

describe("createDescriptionClient", () => {
  const config = parseConfig({});

  it("uses the filename client without a usable key", () => {
    expect(createDescriptionClient(config, "")).toBeInstanceOf(FilenameDescriptionClient);
    expect(createDescriptionClient(config, "your-api-key-here")).toBeInstanceOf(
      FilenameDescriptionClient,
    );
  });

  it("uses the vision client with a key", () => {
    expect(createDescriptionClient(config, "test-secret")).toBeInstanceOf(VisionDescriptionClient);
  });
});
