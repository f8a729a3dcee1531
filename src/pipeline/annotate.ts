import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { runCommand } from './exec';
import { FFMPEG_BASE_ARGS, escapeDrawtext, escapeFilterValue } from './ffmpeg';
import { debug, info } from './log';
import { clipFileName } from './split';
import { ClipOutcome, ClipRenderer, ClipSplitter, Scene } from './types';

export interface DebugClipDeps {
    splitter: ClipSplitter;
    renderer: ClipRenderer;
}

export function formatAnnotation(scene: Scene): string {
    return (
        `Scene ${scene.scene_id} | ` +
        `Frames: ${scene.start_frame}-${scene.end_frame} | ` +
        `Time: ${scene.start_time.toFixed(2)}s-${scene.end_time.toFixed(2)}s`
    );
}

/** Black bar from (10,10) to (w-10,60) with green text on its baseline at (20,40). */
export function overlayFilter(text: string, fontFile = ''): string {
    const font = fontFile ? `fontfile=${escapeFilterValue(fontFile)}:` : '';
    return [
        'drawbox=x=10:y=10:w=iw-20:h=50:color=black:t=fill',
        `drawtext=${font}text=${escapeDrawtext(text)}:x=20:y=40-ascent:fontsize=20:fontcolor=0x00FF00`,
    ].join(',');
}

export function createFfmpegRenderer(ffmpegBin = ENV.ffmpegBin, fontFile = ENV.annotationFont): ClipRenderer {
    return {
        async render(inputPath: string, outputPath: string, text: string, fps: number): Promise<void> {
            await runCommand(ffmpegBin, [
                ...FFMPEG_BASE_ARGS,
                '-i',
                inputPath,
                '-vf',
                overlayFilter(text, fontFile),
                '-r',
                String(fps),
                '-an',
                '-c:v',
                'libx264',
                '-preset',
                'veryfast',
                '-pix_fmt',
                'yuv420p',
                '-f',
                'mp4',
                outputPath,
            ]);
        },
    };
}

export function annotatedTempPath(clipPath: string): string {
    return clipPath.endsWith('.mp4')
        ? `${clipPath.slice(0, -'.mp4'.length)}_annotated.mp4`
        : `${clipPath}_annotated.mp4`;
}

/**
 * Burns the scene label into every frame of `clipPath`. The overlay is written to a
 * sibling temp file and renamed over the clip, so the clip path only ever holds the
 * untouched or the fully annotated video.
 */
export async function annotateClip(
    clipPath: string,
    scene: Scene,
    fps: number,
    renderer: ClipRenderer
): Promise<void> {
    const tempPath = annotatedTempPath(clipPath);
    try {
        await renderer.render(clipPath, tempPath, formatAnnotation(scene), fps);
        // rename replaces the target in one step
        await fs.rename(tempPath, clipPath);
    } catch (e) {
        await fs.remove(tempPath);
        throw e;
    }
}

export async function generateDebugClips(
    videoPath: string,
    scenes: Scene[],
    fps: number,
    outRoot: string,
    deps: DebugClipDeps
): Promise<ClipOutcome[]> {
    const stem = path.parse(videoPath).name;
    const outDir = path.join(outRoot, stem);
    await fs.ensureDir(outDir);
    await deps.splitter.split(videoPath, scenes, outDir, stem);

    const outcomes: ClipOutcome[] = [];
    for (const [i, scene] of scenes.entries()) {
        const clipPath = path.join(outDir, clipFileName(stem, i + 1));
        if (!(await fs.pathExists(clipPath))) {
            debug('annotate.clip.missing', { clipPath, sceneId: scene.scene_id });
            outcomes.push({ status: 'missing', sceneId: scene.scene_id, clipPath });
            continue;
        }
        await annotateClip(clipPath, scene, fps, deps.renderer);
        outcomes.push({ status: 'annotated', sceneId: scene.scene_id, clipPath });
    }
    info('annotate.done', {
        videoPath,
        outDir,
        annotated: outcomes.filter((o) => o.status === 'annotated').length,
        missing: outcomes.filter((o) => o.status === 'missing').length,
    });
    return outcomes;
}
