import ffmpeg from "fluent-ffmpeg";
import ProgressBar from "progress";
import { EncodeRequest } from "./types";

const STDERR_TAIL_LINES = 10;

function stderrTail(stderr: string | null): string {
  if (!stderr) return "";
  return stderr.trim().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
}

/**
 * Encode the frames listed in a concat-demuxer file into an H.264 video
 */
export async function encodeFrames({
  listPath,
  outputPath,
  fps,
  resolution,
  frameCount
}: EncodeRequest): Promise<void> {
  const bar = new ProgressBar("Encoding [:bar] :current/:total frames :percent :etas", {
    complete: "=",
    incomplete: " ",
    width: 50,
    total: frameCount
  });

  await new Promise<void>((resolve, reject) => {
    let encodedFrames = 0;

    ffmpeg(listPath)
      .inputFormat("concat")
      .inputOptions(["-safe", "0"])
      .size(resolution)
      .videoCodec("libx264")
      .outputOptions(["-pix_fmt", "yuv420p"])
      .fps(fps)
      .output(outputPath)
      .on("start", (commandLine: string) => {
        console.log(`Running: ${commandLine}`);
      })
      .on("progress", (progress: { frames: number }) => {
        const done = Math.min(progress.frames, frameCount);
        if (done > encodedFrames) {
          bar.tick(done - encodedFrames);
          encodedFrames = done;
        }
      })
      .on("end", () => {
        if (!bar.complete) bar.terminate();
        resolve();
      })
      .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
        bar.terminate();
        const details = stderrTail(stderr);
        reject(new Error(details ? `${err.message}\nFFmpeg error: ${details}` : err.message));
      })
      .run();
  });
}
