import { createStore, type StoreApi } from "zustand/vanilla";

/**
 * StateBase<T>
 *
 * 所有“有状态服务”的基类：把“状态存储 + 订阅通知”抽成统一机制，
 * 各业务 Service 只关心：
 * - 处理输入（发现事件 / 定时上报结果）
 * - setState 更新状态
 * - 外部展示层 subscribe 订阅快照
 *
 * 依赖：
 * - zustand/vanilla：不依赖任何 UI 框架的纯 TS 状态容器。
 *
 * 数据流（统一模式）：
 * DiscoverySource.onDevice(...)
 *   -> LocatorSessionService.handleDevice
 *   -> BeaconRegistryService.observe -> setState
 *   -> store 通知 subscribe(listener)
 *   -> 展示层拿到新的不可变快照自行重绘
 *
 * 约定：
 * - 每次 setState 都传入新对象 / 新数组，不在原快照上原地修改。
 *   订阅者拿到的快照可以安全地长期持有。
 */
export default abstract class StateBase<T> {
  /**
   * __store：
   * - 数据来源：构造函数里 createStore(...) 创建
   * - 用途：保存当前状态 T，提供 setState / getState / subscribe
   * - 每个服务实例一个独立 store，多个会话之间互不影响
   */
  protected __store: StoreApi<T>;

  protected constructor(initialState: T) {
    this.__store = createStore<T>(() => initialState);
  }

  /**
   * setState(partial, replace?)
   *
   * - 调用方：子类（BeaconRegistryService / PositionReportService / LocatorSessionService）
   * - partial 可以是 Partial<T>，也可以是 prev => next 的函数
   * - replace=false（默认）浅合并；replace=true 整体替换
   *
   * 数据流：
   * partial -> __store.setState -> store 内部状态更新 -> subscribe(listener) 被触发
   */
  protected setState(
    partial: Partial<T> | ((prevState: T) => T | Partial<T>),
    replace?: boolean
  ): void {
    this.__store.setState(partial, replace);
  }

  /**
   * getState()
   *
   * 同步获取当前完整状态快照。
   */
  getState(): T {
    return this.__store.getState();
  }

  /**
   * subscribe(listener)
   *
   * - 输入：listener(state)
   * - 输出：unsubscribe()
   * - zustand 实际会传 (state, prevState) 两个参数，这里只暴露新状态
   */
  subscribe(listener: (data: T) => void): () => void {
    return this.__store.subscribe((state) => listener(state));
  }
}
