import type { TypedDeviceCategory } from "../core/device-category.js";

/** Describes the application to the SDK during the handshake. */
export interface AppInfo {
  /** Shown in the vendor's app list; at most 256 characters. */
  title: string;
  /** At most 1024 characters. */
  description: string;
  author: {
    name: string;
    contact: string;
  };
  /** Device categories the application drives. Generic devices are not declared here. */
  supportedDevices: TypedDeviceCategory[];
  category: "application" | "game";
}

/** Device details reported by a backend that supports querying. */
export interface DeviceInfo {
  type: TypedDeviceCategory | "system";
  connected: boolean;
}

/** Version triple reported by the SDK availability probe. */
export interface SdkVersion {
  major: number;
  minor: number;
  revision: number;
}
