/** Owner and name of a GitHub repository. */
export interface RepositorySlug {
  owner: string
  repo: string
}
