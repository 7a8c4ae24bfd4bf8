/**
 * Reader configuration
 */
export interface ReaderConfig {
	/**
	 * URI scheme the data and metadata record types must start with
	 * @default RECORD_TYPE_SCHEME
	 */
	scheme?: string;

	/**
	 * Log each step of a read to the console
	 * @default false
	 */
	debug?: boolean;
}
