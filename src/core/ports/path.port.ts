export interface PathPort {
  join(...parts: string[]): string;
}
