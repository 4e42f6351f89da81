/**
 * Lightweight LaTeX environment builder. Produces
 *
 *     \begin{name}[
 *     	key,
 *     ]
 *     block
 *     \end{name}
 *
 * The option section is only written when there is at least one option.
 * One option per line keeps generated files easy to scan and diff.
 */
export class TexEnvironment {
  private options: string[] = [];
  private blocks: string[] = [];

  constructor(private name: string) {}

  addOption(option: string): void {
    this.options.push(option);
  }

  addBlock(block: string): void {
    this.blocks.push(block);
  }

  toString(): string {
    let opening = `\\begin{${this.name}}`;
    if (this.options.length > 0) {
      opening += "[\n";
      for (const option of this.options) {
        opening += `\t${option},\n`;
      }
      opening += "]";
    }

    return [opening, ...this.blocks, `\\end{${this.name}}`].join("\n");
  }
}
