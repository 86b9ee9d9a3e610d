export class AssemblyError extends Error {
  constructor(public readonly detail: string, public readonly line: number) {
    super(`${detail} (line ${line})`);
    this.name = 'AssemblyError';
  }
}
