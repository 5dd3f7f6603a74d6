/**
 * Unit Tests for HeartbeatManager
 */

import { HeartbeatManager } from '../HeartbeatManager';
import { ConnectionEvent, HeartbeatEventData, HeartbeatTimeoutEventData } from '../interfaces';
import { MockWebSocket } from '../../../tests/mocks/websocket-mock';

describe('HeartbeatManager', () => {
  let socket: MockWebSocket;
  let heartbeat: HeartbeatManager | undefined;

  function openSocket(autoRespondToPing: boolean): MockWebSocket {
    const mock = new MockWebSocket('wss://stream.test', {}, { neverOpen: true, autoRespondToPing });
    mock.readyState = MockWebSocket.OPEN;
    return mock;
  }

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    heartbeat?.stop();
    heartbeat = undefined;
    jest.useRealTimers();
  });

  it('应该按间隔发送 ping 并记录往返时间', () => {
    socket = openSocket(true);
    heartbeat = new HeartbeatManager(socket, { interval: 1000, timeout: 500 });
    const received: HeartbeatEventData[] = [];
    heartbeat.on(ConnectionEvent.HEARTBEAT_RECEIVED, (data: HeartbeatEventData) => received.push(data));

    heartbeat.start();
    jest.advanceTimersByTime(1001);

    expect(socket.pingsReceived).toBe(1);
    expect(received).toHaveLength(1);
    expect(received[0].roundTripTime).toBe(1);
    expect(heartbeat.getStats().pongsReceived).toBe(1);
    expect(heartbeat.getStats().avgRoundTripTime).toBe(1);
    expect(heartbeat.isAwaitingPong()).toBe(false);

    jest.advanceTimersByTime(2000);
    expect(socket.pingsReceived).toBe(3);
  });

  it('超时未收到 pong 时应该发出心跳超时事件', () => {
    socket = openSocket(false);
    heartbeat = new HeartbeatManager(socket, { interval: 1000, timeout: 500 });
    const timeouts: HeartbeatTimeoutEventData[] = [];
    heartbeat.on(ConnectionEvent.HEARTBEAT_TIMEOUT, (data: HeartbeatTimeoutEventData) => timeouts.push(data));
    const startedAt = Date.now();

    heartbeat.start();
    jest.advanceTimersByTime(1499);
    expect(timeouts).toHaveLength(0);

    jest.advanceTimersByTime(1);
    expect(timeouts).toHaveLength(1);
    expect(timeouts[0].timeout).toBe(500);
    expect(timeouts[0].lastPingTime).toBe(startedAt + 1000);
    expect(heartbeat.getStats().heartbeatTimeouts).toBe(1);
  });

  it('上一个 ping 未确认时不应该重复发送', () => {
    socket = openSocket(false);
    heartbeat = new HeartbeatManager(socket, { interval: 100, timeout: 1000 });

    heartbeat.start();
    jest.advanceTimersByTime(350);

    expect(socket.pingsReceived).toBe(1);
    expect(heartbeat.isAwaitingPong()).toBe(true);
  });

  it('socket 未打开时不应该发送 ping', () => {
    socket = openSocket(true);
    socket.readyState = MockWebSocket.CONNECTING;
    heartbeat = new HeartbeatManager(socket, { interval: 100, timeout: 50 });

    heartbeat.start();
    jest.advanceTimersByTime(300);

    expect(socket.pingsReceived).toBe(0);
    expect(heartbeat.getStats().pingsSent).toBe(0);
  });

  it('停止后应该清理定时器', () => {
    socket = openSocket(false);
    heartbeat = new HeartbeatManager(socket, { interval: 100, timeout: 50 });
    const onTimeout = jest.fn();
    heartbeat.on(ConnectionEvent.HEARTBEAT_TIMEOUT, onTimeout);

    heartbeat.start();
    jest.advanceTimersByTime(120);
    heartbeat.stop();
    jest.advanceTimersByTime(1000);

    expect(socket.pingsReceived).toBe(1);
    expect(onTimeout).not.toHaveBeenCalled();
    expect(heartbeat.isAwaitingPong()).toBe(false);
  });
});
