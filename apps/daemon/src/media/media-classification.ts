export type MediaCategory = 'series' | 'movies' | 'others';

export const VIDEO_EXTENSIONS = new Set([
  '.mkv',
  '.mp4',
  '.avi',
  '.mov',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
  '.ts',
  '.m2ts',
]);

// S01E02 / s1e2, or 1x02 standing on its own (so 1920x1080 stays a resolution).
const EPISODE_PATTERNS = [
  /(?<![a-z0-9])s\d{1,3}e\d{1,4}(?!\d)/i,
  /(?<![a-z0-9])\d{1,2}x\d{2,3}(?![a-z0-9])/i,
];

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot <= 0 ? '' : fileName.slice(dot).toLowerCase();
}

export function isMediaFile(fileName: string): boolean {
  return VIDEO_EXTENSIONS.has(extensionOf(fileName));
}

export function isEpisode(fileName: string): boolean {
  return EPISODE_PATTERNS.some((re) => re.test(fileName));
}

/**
 * Category for a set of inspected file names: any episode-looking video makes
 * it `series`, any other video `movies`, no video at all `others`.
 */
export function categorize(fileNames: readonly string[]): MediaCategory {
  const media = fileNames.filter(isMediaFile);
  if (!media.length) return 'others';
  return media.some(isEpisode) ? 'series' : 'movies';
}
