import type { HostEntry } from "./Target";

export interface MalformedLine {
  /** 1-based line number in the hosts file */
  readonly line: number;
  readonly text: string;
}

export interface HostsFile {
  readonly entries: ReadonlyArray<HostEntry>;
  readonly malformed: ReadonlyArray<MalformedLine>;
}

const HOST_LINE = /^([-A-Za-z0-9_][-A-Za-z0-9_.]*)=(.*)$/;

const stripComment = (line: string): string => {
  const hash = line.indexOf("#");
  return hash === -1 ? line : line.slice(0, hash);
};

/**
 * Parse a hosts file of `name=user@host:/path` lines.
 *
 * `#` starts a comment anywhere on a line. Blank lines are ignored, and
 * lines that are not `name=remote` are collected as malformed instead of
 * failing the whole file.
 */
export const parseHostsFile = (text: string): HostsFile => {
  const entries: HostEntry[] = [];
  const malformed: MalformedLine[] = [];

  text.split("\n").forEach((raw, index) => {
    const line = stripComment(raw.endsWith("\r") ? raw.slice(0, -1) : raw);
    if (line === "") return;

    const match = HOST_LINE.exec(line);
    const localName = match?.[1];
    const remoteSpec = match?.[2];
    if (localName === undefined || remoteSpec === undefined) {
      malformed.push({ line: index + 1, text: line });
      return;
    }

    entries.push({ localName, remoteSpec });
  });

  return { entries, malformed };
};
