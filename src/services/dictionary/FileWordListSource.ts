import fs from 'node:fs/promises';
import path from 'node:path';
import type { WordListSource } from '../../core/DictionaryIndex';
import type { KeyboardLayout } from '../../types';

export class FileWordListSource implements WordListSource {
  private readonly absolutePath: string;

  public constructor(
    public readonly language: KeyboardLayout,
    filePath: string
  ) {
    this.absolutePath = path.resolve(filePath);
  }

  public describe(): string {
    return this.absolutePath;
  }

  public async read(): Promise<string> {
    return fs.readFile(this.absolutePath, 'utf8');
  }
}
