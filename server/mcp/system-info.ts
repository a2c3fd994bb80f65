import { existsSync } from "node:fs";
import { arch, platform } from "node:os";

const SSH_ENV_VARS = ["SSH_CONNECTION", "SSH_CLIENT", "SSH_TTY"] as const;
const REMOTE_ENV_VARS = ["REMOTE_CONTAINERS", "CODESPACES"] as const;
const REPORTED_ENV_VARS = [
	"SSH_CONNECTION",
	"SSH_CLIENT",
	"DISPLAY",
	"VSCODE_INJECTION",
	"SESSIONNAME",
] as const;

export interface HostEnvironment {
	env: NodeJS.ProcessEnv;
	platform: NodeJS.Platform;
	arch: string;
	nodeVersion: string;
	exists: (path: string) => boolean;
}

export interface SystemInfo {
	platform: NodeJS.Platform;
	architecture: string;
	node_version: string;
	remote_environment: boolean;
	/** A browser can be opened on this machine. */
	gui_available: boolean;
	recommended_interface: "local browser" | "remote browser";
	feedback_url: string;
	environment: Record<(typeof REPORTED_ENV_VARS)[number], string | null>;
}

export function currentHost(): HostEnvironment {
	return {
		env: process.env,
		platform: platform(),
		arch: arch(),
		nodeVersion: process.version,
		exists: existsSync,
	};
}

/** SSH, dev containers, Docker, RDP, and Linux without a display all count. */
export function isRemoteEnvironment(host: HostEnvironment): boolean {
	const set = (name: string) => Boolean(host.env[name]);
	if (SSH_ENV_VARS.some(set) || REMOTE_ENV_VARS.some(set)) {
		return true;
	}
	if (host.exists("/.dockerenv")) {
		return true;
	}
	if (host.platform === "win32" && (host.env.SESSIONNAME ?? "").includes("RDP")) {
		return true;
	}
	return host.platform === "linux" && !host.env.DISPLAY;
}

export function collectSystemInfo(
	feedbackUrl: string,
	host: HostEnvironment = currentHost(),
): SystemInfo {
	const remote = isRemoteEnvironment(host);
	return {
		platform: host.platform,
		architecture: host.arch,
		node_version: host.nodeVersion,
		remote_environment: remote,
		gui_available: !remote,
		recommended_interface: remote ? "remote browser" : "local browser",
		feedback_url: feedbackUrl,
		environment: {
			SSH_CONNECTION: host.env.SSH_CONNECTION ?? null,
			SSH_CLIENT: host.env.SSH_CLIENT ?? null,
			DISPLAY: host.env.DISPLAY ?? null,
			VSCODE_INJECTION: host.env.VSCODE_INJECTION ?? null,
			SESSIONNAME: host.env.SESSIONNAME ?? null,
		},
	};
}
