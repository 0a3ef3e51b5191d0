import { ConfigLoader, LibraryService } from "@reqdeck/core";

export const withLibrary = async <T>(fn: (library: LibraryService) => Promise<T>): Promise<T> => {
  const config = await ConfigLoader.load();
  const library = await LibraryService.create(config.dataDir);
  try {
    return await fn(library);
  } finally {
    await library.close();
  }
};
