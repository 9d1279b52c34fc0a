/**
 * The transient payload file under the metrics root.
 * Overwritten on every run and left in place afterwards.
 */
export interface InstanceDataFile {
	getPath(): string;
	write(payload: string): void;
	read(): Buffer;
}
