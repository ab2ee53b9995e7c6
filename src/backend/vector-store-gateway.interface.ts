/**
 * Calls against the hosted vector store service.
 *
 * Every method resolves with the vendor payload exactly as received; callers
 * validate it through the vendor schema module. Implementations classify
 * vendor failures into NotFoundError and BackendError.
 */
export interface VectorStoreGateway {
  /**
   * Ask the file-search assistant and return the messages its run produced,
   * oldest first
   */
  askAssistant(query: string): Promise<unknown>;

  /**
   * Run a direct semantic search and return the ranked hits
   */
  searchVectorStore(query: string, maxResults: number): Promise<unknown>;

  retrieveFileMetadata(fileId: string): Promise<unknown>;

  /**
   * Look the file up inside the configured vector store.
   * Rejects with NotFoundError when the store does not contain it.
   */
  retrieveVectorStoreFile(fileId: string): Promise<unknown>;

  /**
   * Parsed text chunks of a file in the configured vector store
   */
  retrieveFileContent(fileId: string): Promise<unknown>;
}
