/**
 * src/service-api/IPermissionGate.ts
 *
 * 扫描前置条件：request() 为 false 时会话不会开始消费发现源。
 */

export interface PermissionGrants {
  location: boolean;
  bluetoothScan: boolean;
  bluetoothConnect: boolean;
}

export default interface IPermissionGate {
  request(): Promise<boolean>;
}
