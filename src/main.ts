import { emitKeypressEvents } from 'node:readline';
import { CONFIG_ENV_VAR, ConfigValidationError, loadConfig, type AppConfig } from './core/services/configService';
import { SensorClient } from './core/serial/SensorClient';
import { serialPortTransport } from './core/serial/serialPortTransport';
import { formatReport, formatStatusLine } from './core/session/reportText';
import { ControlLoop } from './state/controlLoop';
import { createSensorStore } from './state/sensorStore';
import { createSessionStore } from './state/sessionStore';

const STATUS_INTERVAL_MS = 1000;

type Keypress = { name?: string; ctrl?: boolean };

function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  let config: AppConfig;
  try {
    config = await loadConfig(argValue('--config') ?? process.env[CONFIG_ENV_VAR]);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error('[Main]', err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const sensorStore = createSensorStore();
  const sessionStore = createSessionStore(config.session);
  const client = new SensorClient(serialPortTransport, sensorStore.getState(), config.sensor);
  const loop = new ControlLoop(sessionStore, sensorStore);

  let lastStatus = 0;
  loop.onFrame((session) => {
    const now = Date.now();
    if (now - lastStatus < STATUS_INTERVAL_MS) return;
    lastStatus = now;
    const battery = sensorStore.getState().battery?.voltage ?? null;
    console.log(formatStatusLine(session, battery, config.session));
  });

  sessionStore.subscribe((state, prev) => {
    if (prev.session.lifecycle !== 'COMPLETE' && state.session.lifecycle === 'COMPLETE') {
      formatReport(state.getReport()).forEach((line) => console.log(line));
      console.log('Press R to restart, Esc to quit');
    }
  });

  sensorStore.subscribe((state, prev) => {
    if (state.status !== prev.status) {
      console.log(`[Sensor] ${state.status}`);
    }
  });

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    loop.stop();
    await client.stop();
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
    console.log('[Main] Bye');
  };

  const requestShutdown = () => {
    shutdown().catch((err) => {
      console.error('[Main] Shutdown failed:', err);
      process.exitCode = 1;
    });
  };

  emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.on('keypress', (_str: string | undefined, key: Keypress | undefined) => {
    if (!key) return;
    const store = sessionStore.getState();

    if (key.name === 'escape' || key.name === 'q' || (key.ctrl && key.name === 'c')) {
      requestShutdown();
    } else if (key.name === 'space') {
      store.start();
    } else if (key.name === 'r') {
      store.restart();
    } else if (key.name === 'c') {
      store.recalibrate();
    } else if (key.name === 'z') {
      client
        .calibrateZero()
        .then((sent) => {
          if (sent) console.log('[Main] Device zero command sent');
        })
        .catch((err) => console.error('[Main] Device zero failed:', err));
    }
  });
  process.on('SIGINT', requestShutdown);

  console.log('Rehab Racer: SPACE start, C recalibrate, Z device zero, R restart, Esc quit');
  client.start();
  loop.start();
}

main().catch((err) => {
  console.error('[Main] Fatal error:', err);
  process.exitCode = 1;
});
