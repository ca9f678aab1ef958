/** Kept out of the package entry point: only `wrapReport` can mint reports. */
export const reportBrand = Symbol("report");
