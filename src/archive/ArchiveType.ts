/**
 * Container formats recognized by the opener.
 */
export enum ArchiveType {
  Plain = "plain",
  Gzip = "gz",
  Zip = "zip",
  TarGz = "tgz",
}

/** Values accepted for an explicit archive type */
export const ARCHIVE_TYPE_NAMES = ["plain", "gz", "zip", "tgz", "tar.gz"] as const;

export type ArchiveTypeName = (typeof ARCHIVE_TYPE_NAMES)[number];

function fromName(name: ArchiveTypeName): ArchiveType {
  switch (name) {
    case "plain":
      return ArchiveType.Plain;
    case "gz":
      return ArchiveType.Gzip;
    case "zip":
      return ArchiveType.Zip;
    case "tgz":
    case "tar.gz":
      return ArchiveType.TarGz;
  }
}

/**
 * Archive type from the remote filename's suffix, unless `override` names
 * one explicitly.
 */
export function sniffArchiveType(filename: string, override?: ArchiveTypeName): ArchiveType {
  if (override) {
    return fromName(override);
  }
  const lower = filename.toLowerCase();
  if (lower.endsWith(".zip")) {
    return ArchiveType.Zip;
  }
  if (lower.endsWith(".tgz") || lower.endsWith(".tar.gz")) {
    return ArchiveType.TarGz;
  }
  if (lower.endsWith(".gz")) {
    return ArchiveType.Gzip;
  }
  return ArchiveType.Plain;
}
