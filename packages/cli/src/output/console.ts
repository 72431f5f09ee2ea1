/**
 * Where results go. stdout in the binary, a buffer in tests.
 */
export interface Output {
  print(line: string): void;
}

export const consoleOutput: Output = {
  print: (line) => console.log(line),
};

export class BufferedOutput implements Output {
  readonly lines: string[] = [];

  print(line: string): void {
    this.lines.push(line);
  }
}
