import { EventEmitter } from "eventemitter3";
import { nanoid } from "nanoid";
import { filter, map, Observable } from "rxjs";
import type { BusEvent, EventPayload, EventType } from "../types/index.js";

export class EventBus {
  // 底层 EventEmitter 负责把事件按推送方式广播给订阅者。
  private emitter = new EventEmitter();

  public emit(event: BusEvent): void {
    this.emitter.emit("event", event);
  }

  /**
   * 便捷方法：补齐 eventId 与时间戳后广播。
   */
  public publish(
    type: EventType,
    traceId: string,
    payload: EventPayload,
    relatedTaskId?: string
  ): BusEvent {
    const event: BusEvent = {
      eventId: nanoid(),
      type,
      timestamp: Date.now(),
      traceId,
      ...(relatedTaskId ? { relatedTaskId } : {}),
      payload,
    };
    this.emit(event);
    return event;
  }

  /**
   * 冷 Observable：订阅时挂接监听，取消订阅时自动移除。
   */
  public events(): Observable<BusEvent> {
    return new Observable<BusEvent>((subscriber) => {
      const handler = (event: BusEvent) => subscriber.next(event);
      this.emitter.on("event", handler);
      return () => {
        this.emitter.off("event", handler);
      };
    });
  }

  public eventsOfType(type: EventType): Observable<BusEvent> {
    return this.events().pipe(filter((evt) => evt.type === type));
  }

  public eventsForTask(taskId: string): Observable<BusEvent> {
    return this.events().pipe(filter((evt) => evt.relatedTaskId === taskId));
  }

  public mapEvents<T>(project: (event: BusEvent) => T): Observable<T> {
    return this.events().pipe(map(project));
  }
}
