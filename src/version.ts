/**
 * @file Release version reported by the server and the console client.
 *
 * @module
 */

export const VERSION: string = '0.4.0';
