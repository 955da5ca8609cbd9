/**
 * IRepositoryFetcher - brings a repository onto local disk for scanning
 *
 * @module
 */

export interface IRepositoryFetcher {
  /**
   * Materialize `identifier` under `workDirectory`.
   *
   * @returns Absolute path of the local checkout
   * @throws RepositoryError when the repository cannot be fetched
   */
  fetch(identifier: string, workDirectory: string): Promise<string>;

  /**
   * Remove a checkout returned by `fetch`.
   */
  cleanup(localPath: string): Promise<void>;
}
