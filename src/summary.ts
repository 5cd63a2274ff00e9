import type { UninstallResult } from "./uninstall.js";

function pluralize(count: number, singular: string): string {
	return count === 1 ? `${count} ${singular}` : `${count} ${singular}s`;
}

export function renderUninstallSummary(result: UninstallResult): string {
	const absentSuffix =
		result.absent.length > 0 ? `, ${result.absent.length} already absent` : "";
	return `Uninstalled ${pluralize(result.removed.length, "file")}${absentSuffix}`;
}

export function renderDryRunSummary(targets: string[]): string {
	return `Would uninstall ${pluralize(targets.length, "file")}`;
}

interface StoppedInput {
	position: number;
	total: number;
}

export function renderStoppedAt(input: StoppedInput): string {
	return `Stopped at file ${input.position} of ${input.total}`;
}
