import { on } from 'node:events';
import { SerialPort, ReadlineParser } from 'serialport';
import type { SensorSettings } from '../models/types';
import type { SerialLink, SerialTransport } from './SensorClient';
import { pickPort } from './discovery';

class SerialPortLink implements SerialLink {
  private parser: ReadlineParser;

  constructor(private port: SerialPort) {
    this.parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
  }

  async *lines(): AsyncIterable<string> {
    const ac = new AbortController();
    const onClose = () => ac.abort();
    const onError = (err: Error) => ac.abort(err);
    this.port.once('close', onClose);
    this.port.once('error', onError);

    try {
      for await (const args of on(this.parser, 'data', { signal: ac.signal })) {
        const line: unknown = args[0];
        if (typeof line === 'string') yield line;
      }
    } catch (err) {
      if (!ac.signal.aborted) throw err;
      const reason: unknown = ac.signal.reason;
      if (reason instanceof Error && reason.name !== 'AbortError') throw reason;
    } finally {
      this.port.off('close', onClose);
      this.port.off('error', onError);
    }
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
      });
    });
  }

  close(): Promise<void> {
    if (!this.port.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

export const serialPortTransport: SerialTransport = {
  async discover(settings: SensorSettings): Promise<string | null> {
    if (settings.port) return settings.port;
    const ports = await SerialPort.list();
    return pickPort(
      ports.map((p) => ({ path: p.path, manufacturer: p.manufacturer, pnpId: p.pnpId })),
      settings
    );
  },

  open(path: string, settings: SensorSettings): Promise<SerialLink> {
    const port = new SerialPort({ path, baudRate: settings.baudRate, autoOpen: false });
    return new Promise((resolve, reject) => {
      port.open((err) => (err ? reject(err) : resolve(new SerialPortLink(port))));
    });
  },
};
