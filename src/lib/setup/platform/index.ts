import type {OperatingSystem} from '../../types.js'
import type {PlatformStrategy} from '../types.js'
import {linuxStrategy} from './linux.js'
import {macosStrategy} from './macos.js'
import {unknownStrategy} from './unknown.js'
import {windowsStrategy} from './windows.js'

export {elevate, findPackageManager, LINUX_PACKAGE_MANAGERS} from './linux.js'
export type {LinuxPackageManager} from './linux.js'

export function selectPlatformStrategy(os: OperatingSystem): PlatformStrategy {
  switch (os) {
    case 'Linux':
      return linuxStrategy
    case 'macOS':
      return macosStrategy
    case 'Windows':
      return windowsStrategy
    case 'Unknown':
      return unknownStrategy
  }
}
