const FORMAT_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

export const human = (bytes: number | null | undefined): string => {
	if (bytes === 0) return '0 B';
	if (typeof bytes !== 'number' || !Number.isFinite(bytes) || bytes < 0) {
		return '-';
	}

	const unitIndex = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		FORMAT_UNITS.length - 1,
	);
	const value = bytes / 1024 ** unitIndex;
	const decimals = value >= 10 || unitIndex === 0 ? 0 : 1;

	return `${value.toFixed(decimals)} ${FORMAT_UNITS[unitIndex]}`;
};

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatCompactTimestamp = (date: Date): string =>
	`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const formatTimestamp = (date: Date): string =>
	`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatDuration = (milliseconds: number): string => {
	const seconds = Math.max(0, Math.round(milliseconds / 1000));
	if (seconds < 60) return `${seconds}s`;

	const minutes = Math.floor(seconds / 60);
	return `${minutes}m ${seconds % 60}s`;
};

export const pluralize = (count: number, noun: string): string =>
	`${count} ${noun}${count === 1 ? '' : 's'}`;
