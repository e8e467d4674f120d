import type { SourceFile } from './workspace';

export class ContextBuilder {
  /**
   * Formats the target's sources for a prompt.
   *
   * An empty workspace is stated explicitly so the model does not invent
   * files to refer to.
   */
  static sources(files: SourceFile[]): string {
    if (files.length === 0) {
      return '(No source files were found in the target directory.)';
    }
    return files.map((f) => `--- FILE: ${f.filePath} ---\n${f.content}\n--- END FILE ---`).join('\n\n');
  }

  /** Sources followed by the pipeline's previous output under `heading` */
  static build(target: string, files: SourceFile[], heading: string, previous: string): string {
    const sections = [`TARGET DIRECTORY: ${target}`, `SOURCE CODE:\n${ContextBuilder.sources(files)}`];
    if (previous.trim() !== '') {
      sections.push(`${heading}:\n${previous.trim()}`);
    }
    return sections.join('\n\n');
  }
}
