import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { LqaResultFile, QualityStatus } from "../../models/QualityEvaluation";
import { ConfigError, TmsError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { formatScore } from "../quality/scoring";

export interface PhraseCredentials {
  token: string;
  projectId: string;
  baseUrl: string;
}

/** LQA result attached to one unit, addressed by its key name (the unit resname). */
export interface UnitAnnotation {
  keyName: string;
  weightedScore: number;
  status: QualityStatus;
}

export interface UploadSummary {
  uploadId: string | null;
  commentsAdded: number;
  /** Key names that could not be found in the project. */
  missingKeys: string[];
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PhraseClientOptions {
  credentials: PhraseCredentials;
  fetch?: FetchLike;
  logger?: Logger;
}

const uploadResponseSchema = z.object({ id: z.string() }).passthrough();
const keysResponseSchema = z.array(z.object({ id: z.string(), name: z.string() }).passthrough());

export const formatLqaComment = (annotation: Pick<UnitAnnotation, "weightedScore" | "status">) =>
  `LQA ${formatScore(annotation.weightedScore)} (${annotation.status})`;

/** One annotation per evaluated entry, keyed by display key. */
export const annotationsFromLqaResults = (file: LqaResultFile): UnitAnnotation[] =>
  file.entries.flatMap((entry) =>
    entry.evaluation
      ? [
          {
            keyName: entry.displayKey,
            weightedScore: entry.evaluation.weightedScore,
            status: entry.evaluation.status,
          },
        ]
      : [],
  );

export class PhraseTmsClient {
  private readonly credentials: PhraseCredentials;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: PhraseClientOptions) {
    const { token, projectId } = options.credentials;
    if (!token) throw new ConfigError("Phrase API token is required");
    if (!projectId) throw new ConfigError("Phrase project id is required");
    this.credentials = {
      ...options.credentials,
      baseUrl: options.credentials.baseUrl.replace(/\/+$/, ""),
    };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger("phrase-client");
  }

  private projectUrl(suffix: string): string {
    const project = encodeURIComponent(this.credentials.projectId);
    return `${this.credentials.baseUrl}/projects/${project}${suffix}`;
  }

  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set("Authorization", `token ${this.credentials.token}`);
    const response = await this.fetchImpl(url, { ...init, headers });
    if (!response.ok) {
      let body = "";
      try {
        body = await response.text();
      } catch (error) {
        this.logger.debug({ err: error, url }, "Could not read Phrase error body");
      }
      throw new TmsError(
        `Phrase request failed (${response.status}) ${init.method ?? "GET"} ${url}${body ? `: ${body.slice(0, 200)}` : ""}`,
        response.status,
      );
    }
    return response;
  }

  private async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init?: RequestInit,
  ): Promise<T> {
    const response = await this.request(url, init);
    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TmsError(`Unexpected Phrase response from ${url}`, response.status);
    }
    return parsed.data;
  }

  async uploadExchangeFile(
    filePath: string,
    locale: string,
    annotations: readonly UnitAnnotation[] = [],
  ): Promise<UploadSummary> {
    const content = await fs.readFile(filePath);
    const form = new FormData();
    form.append("file", new Blob([content], { type: "application/xml" }), path.basename(filePath));
    form.append("file_format", "xliff");
    form.append("locale_id", locale);
    form.append("update_translations", "true");

    const upload = await this.requestJson(this.projectUrl("/uploads"), uploadResponseSchema, {
      method: "POST",
      body: form,
    });
    this.logger.info({ filePath, locale, uploadId: upload.id }, "Uploaded exchange file");

    let commentsAdded = 0;
    const missingKeys: string[] = [];
    for (const annotation of annotations) {
      const keyId = await this.findKeyId(annotation.keyName);
      if (!keyId) {
        missingKeys.push(annotation.keyName);
        this.logger.warn({ keyName: annotation.keyName }, "Phrase key not found; comment skipped");
        continue;
      }
      await this.addComment(keyId, formatLqaComment(annotation));
      commentsAdded += 1;
    }

    return { uploadId: upload.id, commentsAdded, missingKeys };
  }

  async findKeyId(keyName: string): Promise<string | null> {
    const query = new URLSearchParams({ q: `name:${keyName}` });
    const keys = await this.requestJson(this.projectUrl(`/keys?${query.toString()}`), keysResponseSchema);
    return keys.find((key) => key.name === keyName)?.id ?? null;
  }

  async addComment(keyId: string, message: string): Promise<void> {
    await this.request(this.projectUrl(`/keys/${encodeURIComponent(keyId)}/comments`), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message }),
    });
  }

  async downloadJobLocale(jobId: string, locale: string): Promise<string> {
    const query = new URLSearchParams({ file_format: "xliff", tags: `job-${jobId}` });
    const response = await this.request(
      this.projectUrl(`/locales/${encodeURIComponent(locale)}/download?${query.toString()}`),
    );
    const xml = await response.text();
    this.logger.info({ jobId, locale, bytes: xml.length }, "Downloaded exchange file");
    return xml;
  }
}
