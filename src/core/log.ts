import type { WriteLine } from "./types.js";

export const silentLog: WriteLine = () => {};

export const stderrLog: WriteLine = (line) => {
  process.stderr.write(`${line}\n`);
};

export const collectLog = (lines: string[]): WriteLine => {
  return (line) => {
    lines.push(line);
  };
};
