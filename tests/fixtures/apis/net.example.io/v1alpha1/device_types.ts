export interface DeviceSpec {
  name: string;
  ipAddress: string;
}

export interface DeviceStatus {
  ready?: boolean;
}
