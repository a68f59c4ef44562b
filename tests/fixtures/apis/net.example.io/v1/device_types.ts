export interface DeviceSpec {
  name: string;
  ip: string;
  port?: number;
}

export interface DeviceStatus {
  ready?: boolean;
}
