import { describeError, ReconcileError } from '../errors.mts';
import { uiError } from './console.mts';

interface ServiceDefinition<T, P, O> {
  execute: (deps: T) => (params: P) => Promise<O>;
}

type CommandOptions = Record<string, unknown>;

interface ControllerDefaults {
  renderSuccess: (data: unknown) => Promise<void> | void;
  renderError: (error: unknown) => Promise<void> | void;
}

const defaults: ControllerDefaults = {
  renderSuccess: (data) => {
    console.log(JSON.stringify(data, null, 2));
  },

  renderError(error) {
    if (error instanceof ReconcileError) {
      uiError(`${error.code}: ${error.message}`);
    } else {
      uiError(`UNEXPECTED_ERROR: ${describeError(error)}`);
    }
    process.exitCode = 1;
  },
};

interface ServiceBuilder<P, O> {
  renderError(
    renderer: (error: unknown) => Promise<void> | void,
  ): ServiceBuilder<P, O>;
  renderSuccess(
    renderer: (data: O, params: P) => Promise<void> | void,
  ): ServiceBuilder<P, O>;
  buildAction(): (options: CommandOptions) => Promise<void>;
}

/**
 * Binds services to commander actions. Dependencies are resolved when the
 * action runs, so `--help` works without a configured environment.
 */
export function createController<T>(resolveDeps: () => T) {
  return function controllerFactory<P, O>(service: ServiceDefinition<T, P, O>) {
    return {
      extractParams(
        extractor: (options: CommandOptions) => P | Promise<P>,
      ): ServiceBuilder<P, O> {
        let renderSuccess: (data: O, params: P) => Promise<void> | void =
          defaults.renderSuccess;
        let renderError = defaults.renderError;

        const handler = async (options: CommandOptions) => {
          try {
            const params = await extractor(options);
            const deps = resolveDeps();
            const data = await service.execute(deps)(params);
            await renderSuccess(data, params);
          } catch (error) {
            await renderError(error);
          }
        };

        const serviceBuilder: ServiceBuilder<P, O> = {
          renderError(renderer) {
            renderError = renderer;
            return this;
          },
          renderSuccess(renderer) {
            renderSuccess = renderer;
            return this;
          },
          buildAction() {
            return async (options: CommandOptions) => handler(options);
          },
        };

        return serviceBuilder;
      },
    };
  };
}
