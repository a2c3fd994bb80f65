/** Opens a user-facing surface (browser tab, desktop window) on a URL. */
export interface SurfaceLauncher {
	open(url: string): Promise<void>;
}

/**
 * Prints the URL for the operator to open. Auto-launch heuristics live
 * outside this package.
 */
export class LoggingSurfaceLauncher implements SurfaceLauncher {
	async open(url: string): Promise<void> {
		console.error(`[feedback] Open ${url} to answer the pending request`);
	}
}
