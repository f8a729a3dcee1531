import {
  FileState,
  GoogleGenAI,
  createPartFromUri,
  createUserContent,
  type File as GenAiFile,
  type GenerateContentParameters,
} from '@google/genai';
import { ENV } from './env';
import { ConfigError, PipelineError } from './errors';
import { info, debug } from './log';

/** The slice of the Gemini SDK this module talks to. */
export interface VideoModelClient {
  files: {
    upload(params: { file: string; config: { mimeType: string } }): Promise<GenAiFile>;
    get(params: { name: string }): Promise<GenAiFile>;
  };
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
  };
}

export interface AskOptions {
  model?: string;
  pollMs?: number;
  timeoutMs?: number;
  mimeType?: string;
  client?: VideoModelClient;
  /** Called on every poll while the upload is processing */
  onPoll?: () => void;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function createGeminiClient(apiKey = ENV.geminiApiKey): VideoModelClient {
  if (!apiKey) {
    throw new ConfigError('GEMINI_API_KEY (or API_KEY) is required to query Gemini');
  }
  return new GoogleGenAI({ apiKey });
}

/**
 * Uploads a video, waits until Gemini has processed it, then asks `question` about it.
 */
export async function askAboutVideo(
  videoPath: string,
  question: string,
  opts: AskOptions = {}
): Promise<string> {
  const client = opts.client ?? createGeminiClient();
  const sleep = opts.sleep ?? wait;
  const pollMs = opts.pollMs ?? ENV.geminiPollMs;
  const model = opts.model ?? ENV.geminiModel;

  info('gemini.upload.start', { videoPath });
  let file = await client.files.upload({
    file: videoPath,
    config: { mimeType: opts.mimeType ?? 'video/mp4' },
  });
  const name = file.name;
  if (!name) throw new PipelineError(`Upload of ${videoPath} returned no file name`, 'gemini_upload');
  info('gemini.upload.done', { uri: file.uri, name });

  while (file.state === FileState.PROCESSING) {
    opts.onPoll?.();
    await sleep(pollMs);
    file = await client.files.get({ name });
    debug('gemini.file.poll', { name, state: file.state });
  }
  if (file.state !== FileState.ACTIVE || !file.uri || !file.mimeType) {
    throw new PipelineError(`Video processing failed: ${file.state ?? 'UNKNOWN'}`, 'gemini_file_failed', {
      name,
      state: file.state,
    });
  }

  info('gemini.generate.start', { model });
  const response = await client.models.generateContent({
    model,
    contents: createUserContent([createPartFromUri(file.uri, file.mimeType), question]),
    config: { httpOptions: { timeout: opts.timeoutMs ?? ENV.geminiTimeoutMs } },
  });
  const text = response.text ?? '';
  if (!text) throw new PipelineError('Gemini returned an empty response', 'gemini_empty');
  return text;
}
