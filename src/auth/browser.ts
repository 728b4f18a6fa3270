import open from 'open';

export type BrowserOpener = (url: string) => Promise<boolean>;

/**
 * Open a URL in the default browser. Resolves false when the opener could not
 * be started; an opener that starts and then fails still resolves true.
 */
export const openBrowser: BrowserOpener = async (url) => {
  try {
    await open(url);
    return true;
  } catch {
    return false;
  }
};
