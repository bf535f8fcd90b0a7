import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type { RgbImage } from "@viewsynth/image-core";
import { consoleLogger } from "@viewsynth/session-core";
import type { FrameSink, Logger } from "@viewsynth/session-core";

export interface PngFrameSinkOptions {
  dumpDir: string;
  /** Rewritten with every shown frame when set. */
  previewPath?: string;
  logger?: Logger;
}

export async function encodePng(frame: RgbImage): Promise<Buffer> {
  const raw = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  return sharp(raw, { raw: { width: frame.width, height: frame.height, channels: 3 } })
    .png()
    .toBuffer();
}

export class PngFrameSink implements FrameSink {
  private readonly logger: Logger;

  constructor(private readonly options: PngFrameSinkOptions) {
    this.logger = options.logger ?? consoleLogger;
  }

  async show(frame: RgbImage): Promise<void> {
    const { previewPath } = this.options;
    if (!previewPath) return;
    await writeFile(previewPath, await encodePng(frame));
    this.logger.info(`Preview ${frame.width}x${frame.height} -> ${previewPath}`);
  }

  async persist(frame: RgbImage, name: string): Promise<string> {
    await mkdir(this.options.dumpDir, { recursive: true });
    const file = path.join(this.options.dumpDir, `${name}.png`);
    await writeFile(file, await encodePng(frame));
    return file;
  }
}
