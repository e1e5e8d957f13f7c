/** Latest release as reported by the upstream update API. Never persisted. */
export interface ReleaseMetadata {
  /** Dotted numeric version, e.g. "1.5.9" */
  version: string;
  /** 40-char lowercase hex commit the build was cut from */
  commit: string;
  /** Canonical .deb download URL for this version/commit */
  downloadUrl: string;
}
