/**
 * Driver capability
 *
 * The cloud driver answers questions about, and acts on, Compute Engine
 * resources. Steps depend on this interface only; the RPC implementation,
 * its retries and its authentication live with the driver.
 */

export interface DriverCallOptions {
  /** Abort signal forwarded from the step context */
  signal?: AbortSignal;
}

export interface Driver {
  /**
   * Whether a machine image with this name exists in the project.
   * Rejects when the answer cannot be determined.
   */
  machineImageExists(projectId: string, name: string, options?: DriverCallOptions): Promise<boolean>;
}
