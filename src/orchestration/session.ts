import { spawn } from "node:child_process";
import { ConnectionError } from "../errors";

export interface CommandResult {
	code: number;
	stdout: string;
	stderr: string;
}

/** One session to the control node. Commands never overlap. */
export interface RemoteSession {
	exec(command: string, stdin?: string): Promise<CommandResult>;
	close(): Promise<void>;
}

export interface SshTarget {
	host: string;
	user: string;
	privateKeyPath: string;
	connectTimeoutSeconds: number;
}

export type SessionFactory = (target: SshTarget) => Promise<RemoteSession>;

// ssh reports its own failures (connect, auth) with this status.
const SSH_CONNECTION_FAILURE = 255;

export function sshArgs(target: SshTarget): string[] {
	return [
		"-i",
		target.privateKeyPath,
		"-o",
		"BatchMode=yes",
		"-o",
		`ConnectTimeout=${target.connectTimeoutSeconds}`,
		"-o",
		"StrictHostKeyChecking=accept-new",
		`${target.user}@${target.host}`,
	];
}

/** Runs each command through the system `ssh` client. */
export class OpenSshSession implements RemoteSession {
	private constructor(private readonly target: SshTarget) {}

	static async connect(target: SshTarget): Promise<OpenSshSession> {
		const session = new OpenSshSession(target);
		const check = await session.run("true");
		if (check.code !== 0) {
			throw new ConnectionError(target.host, check.stderr.trim() || `ssh exited ${check.code}`);
		}
		return session;
	}

	async exec(command: string, stdin?: string): Promise<CommandResult> {
		const result = await this.run(command, stdin);
		if (result.code === SSH_CONNECTION_FAILURE) {
			throw new ConnectionError(this.target.host, result.stderr.trim() || "connection lost");
		}
		return result;
	}

	async close(): Promise<void> {
		// Each command is its own ssh process; nothing stays open.
	}

	private run(command: string, stdin?: string): Promise<CommandResult> {
		return new Promise((resolve, reject) => {
			const child = spawn("ssh", [...sshArgs(this.target), command], {
				stdio: ["pipe", "pipe", "pipe"],
				env: process.env,
			});
			let stdout = "";
			let stderr = "";
			child.stdout.setEncoding("utf-8").on("data", (chunk: string) => {
				stdout += chunk;
			});
			child.stderr.setEncoding("utf-8").on("data", (chunk: string) => {
				stderr += chunk;
			});
			child.on("error", (err) => reject(new ConnectionError(this.target.host, err.message)));
			// ssh can exit before reading all of stdin; its exit status reports that.
			child.stdin.on("error", (err) => {
				if (!("code" in err && err.code === "EPIPE")) {
					reject(new ConnectionError(this.target.host, err.message));
				}
			});
			child.on("close", (code) => resolve({ code: code ?? SSH_CONNECTION_FAILURE, stdout, stderr }));
			child.stdin.end(stdin ?? "");
		});
	}
}

export const openSshSession: SessionFactory = (target) => OpenSshSession.connect(target);
