import type IPermissionGate from "../service-api/IPermissionGate";
import type { PermissionGrants } from "../service-api/IPermissionGate";

const REQUIRED: readonly (keyof PermissionGrants)[] = ["location", "bluetoothScan", "bluetoothConnect"];

/**
 * ConfigPermissionGate：
 * - 权限结果来自配置（宿主平台在启动前已经完成授权）
 * - 三项全部为 true 才放行
 */
export default class ConfigPermissionGate implements IPermissionGate {
  constructor(private readonly grants: PermissionGrants) {}

  async request(): Promise<boolean> {
    const denied = REQUIRED.filter((name) => !this.grants[name]);

    if (denied.length > 0) {
      console.warn("[Permission] not granted:", denied.join(", "));
      return false;
    }
    return true;
  }
}
