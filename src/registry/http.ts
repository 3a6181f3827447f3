import { createHash } from "node:crypto";
import { z } from "zod";

import { stringToUint8Array, toArrayBuffer } from "../encoding.js";
import { TransportError, UnauthorizedError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { type ByteStream, chunksOf, collect, rechunk, verifyDigest } from "../streams.js";
import {
  type Authenticator,
  parseChallenge,
  TokenAuthenticator,
} from "./auth.js";
import type { Credentials, Registry } from "./registry.js";

const OCI_MANIFEST = "application/vnd.oci.image.manifest.v1+json";
const OCI_EMPTY = "application/vnd.oci.empty.v1+json";
const METADATA_MEDIA_TYPE = "application/vnd.blobtuf.metadata.v1+json";

const EMPTY_CONFIG = stringToUint8Array("{}");

export const DEFAULT_UPLOAD_CHUNK_SIZE = 5 * 1024 * 1024;

const descriptorSchema = z.object({
  mediaType: z.string().optional(),
  digest: z.string().regex(/^sha256:[0-9a-f]{64}$/),
  size: z.number().int().nonnegative(),
});

const manifestSchema = z.object({
  schemaVersion: z.literal(2),
  layers: z.array(descriptorSchema).min(1),
});

const catalogSchema = z.object({
  repositories: z.array(z.string()).nullable().default([]),
});

export interface HttpRegistryOptions {
  /** Registry host, optionally with port. */
  host: string;
  repo: string;
  /** Talk plain http instead of https. */
  insecure?: boolean;
  token?: string;
  credentials?: Credentials;
  authenticator?: Authenticator;
  /** Bytes sent per PATCH of a chunked upload. */
  uploadChunkSize?: number;
  logger?: Logger;
}

function sha256(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Registry collaborator speaking the Docker Registry HTTP API V2. Blobs are
 * stored as registry blobs; a metadata document is stored as a blob referenced
 * from a one-layer OCI manifest tagged with the document's name.
 */
export class HttpRegistry implements Registry {
  /** Bearer token sent with every request; refreshed on a 401 challenge. */
  token?: string;

  private readonly baseUrl: string;
  private readonly authenticator: Authenticator;
  private readonly logger: Logger;

  constructor(private readonly options: HttpRegistryOptions) {
    this.baseUrl = `${options.insecure ? "http" : "https"}://${options.host}/v2/`;
    this.token = options.token;
    this.authenticator =
      options.authenticator ??
      new TokenAuthenticator({ insecure: options.insecure });
    this.logger = options.logger ?? silentLogger;
  }

  private repoScope(actions: string[]): string {
    return `repository:${this.options.repo}:${actions.join(",")}`;
  }

  private async send(url: URL, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers);
    if (this.token) {
      headers.set("Authorization", `Bearer ${this.token}`);
    }

    this.logger.debug(`${init.method ?? "GET"} ${url.toString()}`);
    try {
      return await fetch(url, { ...init, headers });
    } catch (error) {
      throw new TransportError(
        `Network error calling ${url.toString()}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  // A 401 carrying a bearer challenge is answered once with a fresh token.
  private async request(
    path: string,
    init: RequestInit,
    scope: string,
  ): Promise<Response> {
    const url = new URL(path, this.baseUrl);
    let response = await this.send(url, init);

    if (response.status === 401) {
      const challenge = parseChallenge(response.headers.get("www-authenticate"));
      if (challenge) {
        this.token = await this.authenticator.authenticate(
          this.options.credentials ?? {},
          scope,
          challenge,
        );
        response = await this.send(url, init);
      }
      if (response.status === 401) {
        throw new UnauthorizedError(
          `Registry refused access to ${scope}`,
          response.status,
        );
      }
    }
    return response;
  }

  private expectStatus(response: Response, what: string, ...statuses: number[]): void {
    if (!statuses.includes(response.status)) {
      throw new TransportError(
        `${what} failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
  }

  private blobPath(digest: string): string {
    return `${this.options.repo}/blobs/sha256:${digest}`;
  }

  /**
   * Probes the registry for its challenge and exchanges `credentials` for a
   * token covering `actions` on this repository. Resolves to undefined when
   * the registry does not ask for authentication.
   */
  async authenticate(
    credentials: Credentials,
    actions: string[],
  ): Promise<string | undefined> {
    const response = await this.send(new URL(this.baseUrl), { method: "GET" });
    if (response.status !== 401) {
      return undefined;
    }

    const challenge = parseChallenge(response.headers.get("www-authenticate"));
    if (!challenge) {
      throw new UnauthorizedError("Registry sent no bearer challenge", 401);
    }
    this.token = await this.authenticator.authenticate(
      credentials,
      this.repoScope(actions),
      challenge,
    );
    return this.token;
  }

  private async startUpload(digest: string, scope: string): Promise<URL> {
    const response = await this.request(
      `${this.options.repo}/blobs/uploads/`,
      { method: "POST" },
      scope,
    );
    this.expectStatus(response, `Starting upload of ${digest}`, 202);
    return this.uploadLocation(response, digest);
  }

  private uploadLocation(response: Response, digest: string): URL {
    const location = response.headers.get("location");
    if (!location) {
      throw new TransportError(`Registry sent no upload location for ${digest}`);
    }
    return new URL(location, this.baseUrl);
  }

  /**
   * Chunked upload. Each chunk goes out in its own PATCH before the next one
   * is read; the closing PUT names the digest the registry must verify.
   */
  async putBlob(digest: string, chunks: ByteStream, size: number): Promise<void> {
    const scope = this.repoScope(["pull", "push"]);
    const chunkSize = this.options.uploadChunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE;
    let location: URL | undefined;
    let offset = 0;

    for await (const chunk of rechunk(chunks, chunkSize)) {
      if (offset + chunk.byteLength > size) {
        throw new TransportError(
          `Blob ${digest} produced more than the expected ${size} bytes`,
        );
      }
      location ??= await this.startUpload(digest, scope);

      const response = await this.request(
        location.toString(),
        {
          method: "PATCH",
          headers: {
            "Content-Type": "application/octet-stream",
            "Content-Range": `${offset}-${offset + chunk.byteLength - 1}`,
          },
          body: toArrayBuffer(chunk),
        },
        scope,
      );
      this.expectStatus(response, `Uploading ${digest}`, 202);
      location = this.uploadLocation(response, digest);
      offset += chunk.byteLength;
    }

    if (offset !== size) {
      throw new TransportError(
        `Blob ${digest} produced ${offset} bytes, expected ${size}`,
      );
    }

    const finishUrl = location ?? (await this.startUpload(digest, scope));
    finishUrl.searchParams.set("digest", `sha256:${digest}`);
    const finish = await this.request(finishUrl.toString(), { method: "PUT" }, scope);
    this.expectStatus(finish, `Uploading ${digest}`, 201);
  }

  async *getBlob(digest: string): ByteStream {
    const response = await this.request(
      this.blobPath(digest),
      { method: "GET" },
      this.repoScope(["pull"]),
    );
    this.expectStatus(response, `Fetching ${digest}`, 200);

    if (!response.body) {
      yield new Uint8Array(await response.arrayBuffer());
      return;
    }

    const reader = response.body.getReader();
    // set while suspended at a yield; the consumer stopped early if still set
    let suspended = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        suspended = true;
        yield value;
        suspended = false;
      }
    } finally {
      if (suspended) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  async deleteBlob(digest: string): Promise<void> {
    const response = await this.request(
      this.blobPath(digest),
      { method: "DELETE" },
      this.repoScope(["*"]),
    );
    this.expectStatus(response, `Deleting ${digest}`, 200, 202, 404);
  }

  async blobExists(digest: string): Promise<boolean> {
    const response = await this.request(
      this.blobPath(digest),
      { method: "HEAD" },
      this.repoScope(["pull"]),
    );
    this.expectStatus(response, `Checking ${digest}`, 200, 404);
    return response.status === 200;
  }

  private async ensureBlob(data: Uint8Array): Promise<string> {
    const digest = sha256(data);
    if (!(await this.blobExists(digest))) {
      await this.putBlob(digest, chunksOf(data), data.byteLength);
    }
    return digest;
  }

  async putMetadata(name: string, data: Uint8Array): Promise<void> {
    const configDigest = await this.ensureBlob(EMPTY_CONFIG);
    const digest = await this.ensureBlob(data);

    const manifest = {
      schemaVersion: 2,
      mediaType: OCI_MANIFEST,
      config: {
        mediaType: OCI_EMPTY,
        digest: `sha256:${configDigest}`,
        size: EMPTY_CONFIG.byteLength,
      },
      layers: [
        {
          mediaType: METADATA_MEDIA_TYPE,
          digest: `sha256:${digest}`,
          size: data.byteLength,
        },
      ],
    };

    const response = await this.request(
      `${this.options.repo}/manifests/${encodeURIComponent(name)}`,
      {
        method: "PUT",
        headers: { "Content-Type": OCI_MANIFEST },
        body: JSON.stringify(manifest),
      },
      this.repoScope(["pull", "push"]),
    );
    this.expectStatus(response, `Publishing ${name}`, 200, 201);
  }

  async getMetadata(name: string): Promise<Uint8Array | undefined> {
    const response = await this.request(
      `${this.options.repo}/manifests/${encodeURIComponent(name)}`,
      { method: "GET", headers: { Accept: OCI_MANIFEST } },
      this.repoScope(["pull"]),
    );
    if (response.status === 404) {
      return undefined;
    }
    this.expectStatus(response, `Fetching ${name}`, 200);

    const manifest = manifestSchema.parse(await response.json());
    const layer = manifest.layers[0];
    const digest = layer.digest.slice("sha256:".length);
    return await collect(verifyDigest(this.getBlob(digest), digest, layer.size));
  }

  async listRepositories(): Promise<string[]> {
    const response = await this.request(
      "_catalog",
      { method: "GET" },
      "registry:catalog:*",
    );
    this.expectStatus(response, "Listing repositories", 200);
    return catalogSchema.parse(await response.json()).repositories ?? [];
  }
}
