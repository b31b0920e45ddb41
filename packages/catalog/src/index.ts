/**
 * @checkpoint-guide/catalog
 *
 * Where location graphs come from: facility files on disk, and the manual
 * selection helpers used when scanning is not possible.
 */

export * from "./facility-file.js";
export * from "./manual-selector.js";
