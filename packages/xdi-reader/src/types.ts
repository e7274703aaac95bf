/** One data column of an XDI file */
export interface XdiColumn {
  /** 1-based column number */
  index: number;
  label: string;
  units: string | null;
  /** Beamline address given after `||` in the column definition */
  address: string | null;
  values: number[];
}

/** A parsed XAS Data Interchange file */
export interface XdiFile {
  /** Version from the `# XDI/<version>` line */
  version: string;
  /** Application versions following the XDI version, if any */
  extraVersion: string | null;
  /**
   * Header fields by family, then keyword. Both are lower-cased.
   * `Column.N` fields are described by {@link XdiFile.columns} instead.
   */
  metadata: Map<string, Map<string, string>>;
  columns: XdiColumn[];
  /** Free-form comment lines between `# ///` and the `#---` separator */
  comments: string[];
  /** Number of data rows */
  npts: number;
}
