import { resolveConfig, validateConfig } from './config';
import { runStartupChecks } from './bootstrap/startupChecks';
import { DictionaryIndex } from './core/DictionaryIndex';
import { LayoutAssistantApp } from './core/LayoutAssistantApp';
import { StructuredLogger } from './logging/StructuredLogger';
import { GlobalKeystrokeTap } from './services/capture/GlobalKeystrokeTap';
import { MacClipboard } from './services/clipboard/MacClipboard';
import { FrontmostAppMonitor } from './services/context/FrontmostAppMonitor';
import { FileWordListSource } from './services/dictionary/FileWordListSource';
import { KeystrokeInjector } from './services/inject/KeystrokeInjector';
import { InputSourceSwitcher } from './services/layout/InputSourceSwitcher';

let keystrokeTap: GlobalKeystrokeTap | undefined;
let contextMonitor: FrontmostAppMonitor | undefined;
let orchestrator: LayoutAssistantApp | undefined;
let logger: StructuredLogger | undefined;
let shuttingDown = false;

const bootstrap = async (): Promise<void> => {
  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid keymend configuration:\n- ${configErrors.join('\n- ')}`);
  }

  logger = await StructuredLogger.create(config.logDir, config.logLevel);
  logger.info('keymend bootstrap started', {
    logPath: logger.getLogPath(),
    autoReplace: config.autoReplace,
    selectionHotkey: config.selectionHotkey
  });

  await runStartupChecks(config, logger);

  const inputSources = new InputSourceSwitcher({
    binary: config.inputSourceBin,
    timeoutMs: config.commandTimeoutMs,
    logger: logger.child('input-source')
  });
  const injector = new KeystrokeInjector({
    timeoutMs: config.commandTimeoutMs,
    logger: logger.child('injector')
  });
  const dictionary = new DictionaryIndex(logger.child('dictionary'));

  contextMonitor = new FrontmostAppMonitor({
    pollMs: config.contextPollMs,
    timeoutMs: config.commandTimeoutMs,
    inputSource: inputSources,
    logger: logger.child('context')
  });
  keystrokeTap = new GlobalKeystrokeTap(
    (stroke) => orchestrator?.handleKeyStroke(stroke) ?? false,
    logger.child('tap')
  );

  orchestrator = new LayoutAssistantApp(
    {
      dictionary,
      synthesizer: injector,
      shortcuts: injector,
      clipboard: new MacClipboard({ timeoutMs: config.commandTimeoutMs, logger: logger.child('clipboard') }),
      layoutSwitcher: inputSources,
      context: contextMonitor,
      capture: keystrokeTap
    },
    logger,
    {
      autoReplace: config.autoReplace,
      selectionHotkey: config.selectionHotkey,
      maxTokenLength: config.maxTokenLength,
      focusGraceMs: config.focusGraceMs,
      copyDelayMs: config.copyDelayMs,
      pasteDelayMs: config.pasteDelayMs
    }
  );

  orchestrator.on('stateChanged', (state) => {
    if (state.stage === 'error') {
      logger?.error('Assistant entered error state', { detail: state.detail });
    }
  });

  try {
    const initialLayout = await inputSources.currentLayout();
    if (initialLayout) {
      orchestrator.setActiveLayout(initialLayout);
    }
  } catch (error) {
    logger.warn('Could not read the current input source; assuming latin', {
      detail: error instanceof Error ? error.message : String(error)
    });
  }

  // Keystrokes are tracked right away; analysis stays off until the tries are built.
  void dictionary
    .load([
      new FileWordListSource('latin', config.latinDictionaryPath),
      new FileWordListSource('cyrillic', config.cyrillicDictionaryPath)
    ])
    .catch((error: unknown) => {
      logger?.error('Dictionary load failed', {
        detail: error instanceof Error ? error.message : String(error)
      });
    });

  contextMonitor.start();
  await keystrokeTap.start();

  logger.info('keymend ready', { selectionHotkey: orchestrator.hotkey.describeBinding() });
};

const shutdown = async (): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  keystrokeTap?.stop();
  contextMonitor?.stop();
  await orchestrator?.shutdown();
  logger?.info('keymend stopped');
  await logger?.flush();
};

const exitAfterShutdown = (): void => {
  shutdown()
    .catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[keymend] Shutdown failed: ${detail}`);
    })
    .finally(() => {
      process.exit(0);
    });
};

process.on('SIGINT', exitAfterShutdown);
process.on('SIGTERM', exitAfterShutdown);

bootstrap().catch(async (error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  logger?.error('Bootstrap failed', { detail });
  console.error(`[keymend] Failed to start: ${detail}`);
  await shutdown();
  process.exit(1);
});
