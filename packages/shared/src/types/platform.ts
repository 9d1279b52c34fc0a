/**
 * Platform values as a const object.
 * Use these constants instead of string literals for type safety.
 */
export const PLATFORM = {
	AWS: "aws",
	AZURE: "azure",
	NONE: "none",
} as const;

/**
 * Cloud platform whose metadata document is collected.
 * - aws: IMDSv2 instance identity document
 * - azure: instance metadata document, pretty-printed
 * - none: host identity only
 */
export type Platform = (typeof PLATFORM)[keyof typeof PLATFORM];

const PLATFORM_VALUES: readonly string[] = Object.values(PLATFORM);

export function isPlatform(value: unknown): value is Platform {
	return typeof value === "string" && PLATFORM_VALUES.includes(value);
}
