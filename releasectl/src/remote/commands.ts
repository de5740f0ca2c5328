export type RemoteTarget = {
  host: string;
  port?: string;
  user: string;
  /** Remote root; the manifest lands here. */
  baseDir: string;
  /** Directory under baseDir holding one subdirectory per version plus the aliases. */
  downloadsDir: string;
};

export type RemoteCommand = {
  command: string;
  args: string[];
};

/** "host:2222" → { host, port: "2222" }; anything without exactly one colon is a bare host. */
export function parseHostPort(hostPort: string): { host: string; port?: string } {
  const parts = hostPort.split(":");
  if (parts.length === 2 && parts[0] && parts[1]) return { host: parts[0], port: parts[1] };
  return { host: hostPort };
}

/** Single-quote for a POSIX shell on the remote side. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function login(target: RemoteTarget): string {
  return `${target.user}@${target.host}`;
}

export function sshCommand(target: RemoteTarget, remoteCommand: string): RemoteCommand {
  const args = target.port ? ["-p", target.port] : [];
  return { command: "ssh", args: [...args, login(target), remoteCommand] };
}

/** `remoteDir` is not quoted; config validation keeps whitespace and quotes out of remote paths. */
export function scpCommand(target: RemoteTarget, localPath: string, remoteDir: string): RemoteCommand {
  const args = target.port ? ["-P", target.port] : [];
  return { command: "scp", args: [...args, localPath, `${login(target)}:${remoteDir}`] };
}

export function mkdirCommand(target: RemoteTarget, dir: string): RemoteCommand {
  return sshCommand(target, `mkdir -p ${shellQuote(dir)}`);
}

/** `ln -sfn` replaces an existing link in one step, so the alias never dangles. */
export function symlinkCommand(target: RemoteTarget, linkTarget: string, linkPath: string): RemoteCommand {
  return sshCommand(target, `ln -sfn ${shellQuote(linkTarget)} ${shellQuote(linkPath)}`);
}
