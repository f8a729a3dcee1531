/** One entry of the input manifest. Unknown fields are ignored. */
export interface DatasetRecord {
  video: string;
}

export type ResolvedEntry =
  | { status: 'found'; filename: string; path: string }
  | { status: 'missing'; filename: string; path: string };

export interface Scene {
  scene_id: number;
  start_frame: number;
  end_frame: number;
  start_time: number;
  end_time: number;
}

export interface VideoMetadata {
  video_path: string;
  fps: number;
  threshold: number;
  num_scenes: number;
  scenes: Scene[];
}

export interface VideoError {
  error: string;
  video_path: string;
}

export type VideoEntry = VideoMetadata | VideoError;

export interface AggregateMetadata {
  threshold: number;
  total_videos: number;
  debug_mode: boolean;
  videos: Record<string, VideoEntry>;
}

/** Cut interval as reported by a detector: 0-based start frame, exclusive end frame. */
export interface SceneBoundary {
  startFrame: number;
  endFrame: number;
  startTime: number;
  endTime: number;
}

export interface DetectionResult {
  fps: number;
  totalFrames: number;
  scenes: SceneBoundary[];
}

export interface VideoProbe {
  fps: number;
  totalFrames: number;
  width: number;
  height: number;
  durationSec: number;
}

export type ClipOutcome =
  | { status: 'annotated'; sceneId: number; clipPath: string }
  | { status: 'missing'; sceneId: number; clipPath: string };

/** Runs a content-change detector over a whole video. */
export interface SceneDetector {
  detect(videoPath: string, threshold: number): Promise<DetectionResult>;
}

/** Cuts a video into one file per scene, named by `clipFileName`. */
export interface ClipSplitter {
  split(videoPath: string, scenes: Scene[], outDir: string, stem: string): Promise<string[]>;
}

/** Re-encodes a clip with a text overlay burned into every frame. */
export interface ClipRenderer {
  render(inputPath: string, outputPath: string, text: string, fps: number): Promise<void>;
}

export function isVideoError(entry: VideoEntry): entry is VideoError {
  return 'error' in entry;
}
