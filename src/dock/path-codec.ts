// ---------------------------------------------------------------------------
// Desktop path codec – portable form of launcher paths for the docked list
// ---------------------------------------------------------------------------
// Known launcher directories are replaced by a short code so the list
// survives a different home directory or scratch location:
//   /S@ system apps, /L@ local apps, /H@ user apps, /D@ scratch dir
// ---------------------------------------------------------------------------

import * as path from "node:path";

export type DesktopPathCodec = {
  zip: (filePath: string) => string;
  unzip: (encoded: string) => string;
};

type PathCode = { code: string; dir: string };

function withTrailingSlash(dir: string): string {
  const resolved = path.resolve(dir);
  return resolved.endsWith(path.sep) ? resolved : resolved + path.sep;
}

export function createDesktopPathCodec(opts: {
  scratchDir: string;
  userApplicationsDir: string;
}): DesktopPathCodec {
  const codes: PathCode[] = [
    { code: "/S@", dir: "/usr/share/applications/" },
    { code: "/L@", dir: "/usr/local/share/applications/" },
    { code: "/H@", dir: withTrailingSlash(opts.userApplicationsDir) },
    { code: "/D@", dir: withTrailingSlash(opts.scratchDir) },
  ];
  // Most specific directory wins when one nests inside another
  const byDirLength = [...codes].sort((a, b) => b.dir.length - a.dir.length);

  return {
    zip(filePath) {
      const match = byDirLength.find((c) => filePath.startsWith(c.dir));
      return match ? match.code + filePath.slice(match.dir.length) : filePath;
    },
    unzip(encoded) {
      const match = codes.find((c) => encoded.startsWith(c.code));
      return match ? match.dir + encoded.slice(match.code.length) : encoded;
    },
  };
}
