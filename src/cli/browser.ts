import { execFile } from 'child_process'
import * as os from 'os'
import { promisify } from 'util'

const execFileAsync = promisify(execFile)

/**
 * Open a URL with the desktop's default handler
 */
export const openUrlInBrowser = async (url: string): Promise<void> => {
  const target = url.startsWith('http://') || url.startsWith('https://') ? url : `https://${url}`

  switch (os.platform()) {
    case 'darwin':
      await execFileAsync('open', [target])
      break
    case 'win32':
      await execFileAsync('cmd', ['/c', 'start', '""', target])
      break
    default:
      await execFileAsync('xdg-open', [target])
  }
}
