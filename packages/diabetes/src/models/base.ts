/**
 * Base types shared by all diabetes records
 */

/**
 * All diabetes records share these common fields.
 * The streaming buffers only ever look at `timestamp`.
 */
export interface BaseRecord {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  /** IANA timezone the reading was taken in, when the device reports it */
  timezone?: string;
  /** Device serial number (e.g., receiver or pump ID) */
  deviceSerial?: string;
  /** Source file this record came from */
  sourceFile?: string;
  /** When this record was imported */
  importedAt: number;
}
