import { Options } from "@effect/cli";

export const baseDir = Options.text("base-dir").pipe(
  Options.withDescription("Directory holding the mount points (default: $HOME/remote)"),
  Options.optional
);

export const hostsFile = Options.text("hosts-file").pipe(
  Options.withDescription("File of name=user@host:/path lines (default: <base-dir>/.hosts)"),
  Options.optional
);

export const mountCommand = Options.text("mount-command").pipe(
  Options.withDescription("Program used to mount each target"),
  Options.withDefault("sshfs")
);

export const mountOption = Options.text("mount-option").pipe(
  Options.withDescription(
    "Option passed as -o to the mount program; repeatable (default: ServerAliveCountMax=3, ServerAliveInterval=10)"
  ),
  Options.repeated
);

export const noColor = Options.boolean("no-color").pipe(
  Options.withDescription("Plain status lines without ANSI colors"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface MountOptions {
  readonly baseDir: string | undefined;
  readonly hostsFile: string | undefined;
  readonly mountCommand: string;
  readonly mountOptions: ReadonlyArray<string>;
  readonly noColor: boolean;
}
