/**
 * Recipe Schema
 *
 * Describes the single build recipe: where the binding source comes from,
 * which prebuilt native archive it links against, and where the staged
 * shared objects end up.
 */

/**
 * How the vendor archive is fetched.
 *
 * - `script`: delegate to the fetch script shipped in the cloned source tree
 * - `archive`: resolve, download and unpack the archive in-process
 */
export type VendorFetcherKind = "script" | "archive";

/**
 * The recipe as stored in `configs/*.json`.
 */
export interface BuildRecipe {
  /** Recipe identifier (e.g., "pyav-custom-ffmpeg") */
  name: string;

  /** Upstream git repository of the binding project */
  repoUrl: string;

  /** Branch or tag to clone (defaults to the remote HEAD) */
  ref?: string;

  /** Archive URL containing the literal `{platform}` placeholder */
  vendorUrlTemplate: string;

  /** Expected sha256 of the archive, checked by the `archive` fetcher */
  vendorSha256?: string;

  /** Python module imported to probe the installation (e.g., "av") */
  moduleName: string;

  /** Distribution name known to pip (e.g., "av") */
  distribution: string;

  /** Packages installed before the build (build front-end helpers) */
  buildTools: string[];

  /** Runtime search paths baked into the compiled extension */
  rpaths: string[];

  /** Clone target, relative to the invocation directory */
  workDir?: string;

  /** Directory the shared objects are staged into */
  runtimeLibDir?: string;

  /** Vendor descriptor path, relative to the clone */
  descriptorPath?: string;

  /** Vendor directory, relative to the clone */
  vendorDir?: string;

  /** Python interpreter used for pip and the import probe */
  python?: string;

  fetcher?: VendorFetcherKind;

  /** Build manifest path, relative to the invocation directory */
  manifestPath?: string;
}

/**
 * Descriptor file written into the cloned tree for the fetch tool.
 */
export interface VendorDescriptor {
  /** URL template containing `{platform}` */
  url: string;

  /** Optional archive checksum */
  sha256?: string;
}
