import { InvalidArgumentError } from "commander";

export const FLAGS = {
  input: {
    flag: "-i, --input <dir>",
    description: "Input directory containing frames or subdirectories of frames",
  },
  output: {
    flag: "-o, --output <dir>",
    description: "Output directory for videos",
  },
  name: {
    flag: "-n, --name <name>",
    description: "Output filename without extension (ignored with --recursive)",
  },
  resolution: {
    flag: "-r, --resolution <WxH>",
    description: "Output video resolution, e.g. '640x480'",
  },
  fps: {
    flag: "-f, --fps <fps>",
    description: "Frames per second",
  },
  recursive: {
    flag: "--recursive",
    description: "Make one video per subdirectory of the input directory",
  },
  caseSensitive: {
    flag: "--case-sensitive",
    description: "Order letters in frame names by character code instead of ignoring case",
  },
};

const FPS_PATTERN = /^\d+$/;
const RESOLUTION_PATTERN = /^(\d+)x(\d+)$/;

/**
 * Parse a positive integer frame rate (e.g., "24")
 */
export function parseFps(value: string): number {
  const trimmed = value.trim();
  const fps = FPS_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(fps) || fps <= 0) {
    throw new InvalidArgumentError(`Invalid fps: ${value}. Must be a positive integer.`);
  }
  return fps;
}

/**
 * Parse and normalize a WIDTHxHEIGHT resolution (e.g., "640x480")
 */
export function parseResolution(value: string): string {
  const match = value.trim().toLowerCase().match(RESOLUTION_PATTERN);
  if (!match) {
    throw new InvalidArgumentError(`Invalid resolution: ${value}. Expected WIDTHxHEIGHT, e.g. 640x480.`);
  }
  const width = parseInt(match[1], 10);
  const height = parseInt(match[2], 10);
  if (width === 0 || height === 0) {
    throw new InvalidArgumentError(`Invalid resolution: ${value}. Width and height must be positive.`);
  }
  return `${width}x${height}`;
}
