import * as dotenv from 'dotenv';
dotenv.config();

export const ENV = {
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    // Optional: override scenedetect binary name/path
    scenedetectBin: process.env.SCENEDETECT_BIN || 'scenedetect',
    // Optional: python interpreter with scenedetect installed, used when the binary is missing (e.g. .venv/bin/python)
    scenedetectPythonBin: process.env.SCENEDETECT_PYTHON_BIN || '.venv/bin/python',
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
    sceneThreshold: Number(process.env.SCENE_THRESHOLD || 20),
    debugScenesDir: process.env.DEBUG_SCENES_DIR || './debug_scenes',
    // Optional: TTF used by drawtext on debug clips; empty uses the ffmpeg fontconfig default
    annotationFont: process.env.ANNOTATION_FONT || '',
    compressWorkers: Number(process.env.COMPRESS_WORKERS || 4),
    compressCrf: Number(process.env.COMPRESS_CRF || 23),
    geminiApiKey: process.env.GEMINI_API_KEY || process.env.API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.5-pro',
    geminiPollMs: Number(process.env.GEMINI_POLL_MS || 10000),
    geminiTimeoutMs: Number(process.env.GEMINI_TIMEOUT_MS || 600000),
};
