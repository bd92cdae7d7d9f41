import OpenAI, { toFile } from 'openai';
import type { Logger } from 'pino';
import { EMBEDDINGS_ENDPOINT, FileStatus, defaultLogger, isJobStatus } from '@embedbatch/core';
import type { FilePollResult, JobPollResult, RemoteJobClient } from '@embedbatch/core';

type UploadFile = Awaited<ReturnType<typeof toFile>>;

/**
 * The parts of the OpenAI SDK this client uses. An `OpenAI` instance
 * satisfies it; tests pass an in-process stand-in.
 */
export interface BatchApi {
  readonly files: {
    create(body: { file: UploadFile; purpose: 'batch' }): PromiseLike<{ id: string }>;
    retrieve(fileId: string): PromiseLike<{ id: string; status: string }>;
    content(fileId: string): PromiseLike<{ text(): Promise<string> }>;
  };
  readonly batches: {
    create(body: {
      input_file_id: string;
      endpoint: typeof EMBEDDINGS_ENDPOINT;
      completion_window: '24h';
    }): PromiseLike<{ id: string }>;
    retrieve(batchId: string): PromiseLike<{ id: string; status: string; output_file_id?: string | null }>;
  };
}

export interface OpenAIJobClientOptions {
  readonly logger?: Logger;
  /** Name given to uploaded request files. Default: `embedding-requests.jsonl`. */
  readonly fileName?: string;
}

export interface OpenAIConnectionOptions extends OpenAIJobClientOptions {
  readonly apiKey: string;
  readonly baseURL?: string;
  readonly organization?: string;
  /** SDK-level retries for each HTTP call. Default: the SDK's own. */
  readonly maxRetries?: number;
  readonly timeoutMs?: number;
}

/** `RemoteJobClient` over the OpenAI Files and Batches APIs. */
export class OpenAIJobClient implements RemoteJobClient {
  private readonly logger: Logger;
  private readonly fileName: string;

  constructor(
    private readonly api: BatchApi,
    options: OpenAIJobClientOptions = {},
  ) {
    this.logger = (options.logger ?? defaultLogger).child({ component: 'openai-job-client' });
    this.fileName = options.fileName ?? 'embedding-requests.jsonl';
  }

  async submitFile(payload: string): Promise<string> {
    const file = await toFile(Buffer.from(payload, 'utf-8'), this.fileName);
    const created = await this.api.files.create({ file, purpose: 'batch' });
    this.logger.debug({ fileId: created.id, bytes: Buffer.byteLength(payload) }, 'Request file uploaded');
    return created.id;
  }

  async pollFileStatus(fileId: string): Promise<FilePollResult> {
    const file = await this.api.files.retrieve(fileId);
    switch (file.status) {
      case 'processed':
        return { status: FileStatus.PROCESSED, ready: true };
      case 'error':
        return { status: FileStatus.FAILED, ready: false };
      case 'uploaded':
        return { status: FileStatus.UPLOADED, ready: false };
      default:
        return { status: FileStatus.PROCESSING, ready: false };
    }
  }

  async createJob(fileId: string): Promise<string> {
    const batch = await this.api.batches.create({
      input_file_id: fileId,
      endpoint: EMBEDDINGS_ENDPOINT,
      completion_window: '24h',
    });
    return batch.id;
  }

  async pollJobStatus(jobId: string): Promise<JobPollResult> {
    const batch = await this.api.batches.retrieve(jobId);
    if (!isJobStatus(batch.status)) {
      throw new Error(`Batch ${jobId} reported unknown status ${batch.status}`);
    }
    if (batch.output_file_id) {
      return { status: batch.status, resultFileId: batch.output_file_id };
    }
    return { status: batch.status };
  }

  async fetchResultContent(resultFileId: string): Promise<string> {
    return this.download(resultFileId);
  }

  async fetchInputContent(fileId: string): Promise<string> {
    return this.download(fileId);
  }

  private async download(fileId: string): Promise<string> {
    const response = await this.api.files.content(fileId);
    return response.text();
  }
}

/** Build a client on a real `OpenAI` SDK instance. */
export function createOpenAIJobClient(options: OpenAIConnectionOptions): OpenAIJobClient {
  const sdk = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseURL !== undefined ? { baseURL: options.baseURL } : {}),
    ...(options.organization !== undefined ? { organization: options.organization } : {}),
    ...(options.maxRetries !== undefined ? { maxRetries: options.maxRetries } : {}),
    ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
  });
  return new OpenAIJobClient(sdk, options);
}
