/**
 * Rollcall — RDP Files
 *
 * One .rdp connection file per host that runs the rdp service, pointed at
 * the host's public address and, when configured, routed through an
 * RD Gateway. Windows expects CRLF line endings.
 */

import type { ResolvedBox } from '../checks/types.js'
import type { HostServices } from '../services/reverse.js'
import type { RdpConfig } from '../config/types.js'

const BASE_SETTINGS = [
  'screen mode id:i:2',
  'use multimon:i:0',
  'desktopwidth:i:1920',
  'desktopheight:i:1080',
  'session bpp:i:32',
  'compression:i:1',
  'keyboardhook:i:2',
  'audiocapturemode:i:0',
  'videoplaybackmode:i:1',
  'connection type:i:7',
  'networkautodetect:i:1',
  'bandwidthautodetect:i:1',
  'displayconnectionbar:i:1',
  'disable wallpaper:i:0',
  'bitmapcachepersistenable:i:1',
  'audiomode:i:0',
  'redirectclipboard:i:1',
  'autoreconnection enabled:i:1',
  'authentication level:i:2',
  'prompt for credentials:i:0',
  'negotiate security layer:i:1',
]

export function renderRdpFile(box: ResolvedBox, rdp: RdpConfig): string {
  const lines = [...BASE_SETTINGS, `full address:s:${box.publicAddress ?? box.address}`]

  if (rdp.gateway) {
    lines.push(
      `gatewayhostname:s:${rdp.gateway}`,
      'gatewayusagemethod:i:1',
      'gatewayprofileusagemethod:i:1',
      'gatewaycredentialssource:i:0'
    )
  }
  if (rdp.username) lines.push(`username:s:${rdp.username}`)

  return lines.join('\r\n') + '\r\n'
}

/** `<host>.rdp` → file content, for every box assigned the rdp service */
export function renderRdpFiles(
  hostServices: HostServices,
  boxes: readonly ResolvedBox[],
  rdp: RdpConfig
): Map<string, string> {
  const files = new Map<string, string>()
  for (const box of boxes) {
    if (hostServices.get(box.name)?.includes('rdp')) {
      files.set(`${box.name}.rdp`, renderRdpFile(box, rdp))
    }
  }
  return files
}
