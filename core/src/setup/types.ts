/**
 * Types for the setup module.
 */

/** Options for one `devprep setup` run. */
export interface RunConfig {
  /** Block on `tail -f` of the primary log once setup is done. */
  follow: boolean;
}
