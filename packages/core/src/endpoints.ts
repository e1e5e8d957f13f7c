/** Update API queried for the latest stable linux-x64 build. */
export const UPDATE_API_URL =
  "https://api2.cursor.sh/updates/api/update/linux-x64/cursor/1.0.0/hash/stable";

/** Published recipe, used to notice manual pkgrel bumps. */
export const AUR_RECIPE_URL = "https://aur.archlinux.org/cgit/aur.git/plain/PKGBUILD?h=cursor-bin";

export const DOWNLOAD_BASE_URL = "https://downloads.cursor.com/production";

/** Second `source=` entry of the recipe; never rewritten. */
export const COMPANION_SOURCE_PREFIX = "https://gitlab.archlinux.org";

/** sha512 of the companion launcher script, always the second checksum. */
export const COMPANION_SHA512 =
  "937299c6cb6be2f8d25f7dbc95cf77423875c5f8353b8bd6cd7cc8e5603cbf8405b14dbf8bd615db2e3b36ed680fc8e1909410815f7f8587b7267a699e00ab37";

/** Used when the bundled Electron major cannot be determined. */
export const FALLBACK_ELECTRON = "electron28";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36";

/** Packaging assets that must sit next to the recipe. */
export const REQUIRED_PACKAGE_FILES = ["cursor-bin.desktop.in", "cursor.png", "cursor-bin.sh"] as const;

/** Path of product.json inside the .deb data archive. */
export const PRODUCT_JSON_PATH = "./usr/share/cursor/resources/app/product.json";

/** Return the .deb download URL for a build. */
export function getDebUrl(commit: string, version: string): string {
  return `${DOWNLOAD_BASE_URL}/${commit}/linux/x64/deb/amd64/deb/cursor_${version}_amd64.deb`;
}

/** Return the source tarball URL of a VS Code release tag. */
export function getVscodeTarballUrl(vscodeVersion: string): string {
  return `https://github.com/microsoft/vscode/archive/refs/tags/${vscodeVersion}.tar.gz`;
}

/** Extract the build commit from an update URL's `/production/<commit>/` segment. */
export function extractCommitFromUrl(url: string): string | null {
  const match = /\/production\/([a-f0-9]{40})\//.exec(url);
  return match ? match[1] : null;
}
