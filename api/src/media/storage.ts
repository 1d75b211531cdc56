import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { DecodedImage } from './images';

export interface MediaStorage {
  /** Stores the image under `folder` and returns its public URL. */
  save(folder: string, image: DecodedImage): Promise<string>;
  /** Removes a file previously returned by `save`; unknown URLs are ignored. */
  remove(url: string): Promise<void>;
}

export class FileMediaStorage implements MediaStorage {
  constructor(
    private readonly root: string,
    private readonly baseUrl: string
  ) {}

  async save(folder: string, image: DecodedImage): Promise<string> {
    const fileName = `${uuidv4()}.${image.extension}`;
    await mkdir(join(this.root, folder), { recursive: true });
    await writeFile(join(this.root, folder, fileName), image.data);
    return `${this.baseUrl}${folder}/${fileName}`;
  }

  async remove(url: string): Promise<void> {
    if (!url.startsWith(this.baseUrl)) return;

    const relative = url.slice(this.baseUrl.length);
    if (relative.split('/').includes('..')) return;

    await rm(join(this.root, relative), { force: true });
  }
}
