/** Flags shared by every ffmpeg call: overwrite, quiet, never read stdin. */
export const FFMPEG_BASE_ARGS = ['-y', '-loglevel', 'error', '-hide_banner', '-nostdin'];

const backslash = (chars: RegExp) => (s: string) => s.replace(chars, (c) => `\\${c}`);
const escapeOptionValue = backslash(/[\\':]/g);
const escapeGraph = backslash(/[\\'[\],;]/g);

/** Escapes a value for a filter option inside an `-vf` filtergraph (two escaping levels). */
export function escapeFilterValue(value: string): string {
    return escapeGraph(escapeOptionValue(value));
}

/** Like `escapeFilterValue`, plus drawtext's own `%{...}` expansion escaping. */
export function escapeDrawtext(text: string): string {
    return escapeFilterValue(text.replace(/[\\%]/g, (c) => `\\${c}`));
}

/** Re-stamps frame timestamps so consecutive frames are exactly 1/fps apart. */
export function retimeFilter(fps: number): string {
    return `setpts=N/(${fps}*TB)`;
}
