import { ApplyFailure, describeError } from '../../errors.mts';
import type {
  ApplyResult,
  DNSReconcilerDependencies,
  InterfaceRef,
} from './types.mts';

// 0 = applied, 1 = applied but the host wants a reboot.
const SUCCESS_CODES = new Set([0, 1]);

export const applyDNS = {
  execute:
    (deps: Pick<DNSReconcilerDependencies, 'remote' | 'logger'>) =>
    async (params: {
      ref: InterfaceRef;
      desiredDNS: readonly string[];
      dryRun: boolean;
    }): Promise<ApplyResult> => {
      const { remote, logger } = deps;
      const { ref, desiredDNS, dryRun } = params;

      if (dryRun) {
        logger.info(
          { host: ref.hostId, iface: ref.name, dns: desiredDNS },
          'Dry run, DNS order would change',
        );
        return { success: true, resultCode: 0, simulated: true };
      }

      let resultCode: number;
      try {
        resultCode = await remote.setDNSOrder(ref, desiredDNS);
      } catch (error) {
        logger.error(
          { host: ref.hostId, iface: ref.name, err: error },
          'DNS update failed',
        );
        return { success: false, message: describeError(error) };
      }

      if (!SUCCESS_CODES.has(resultCode)) {
        const failure = new ApplyFailure(ref.hostId, resultCode);
        logger.error(
          { host: ref.hostId, iface: ref.name, resultCode },
          failure.message,
        );
        return { success: false, resultCode, message: failure.message };
      }

      if (resultCode === 1) {
        logger.warn(
          { host: ref.hostId, iface: ref.name },
          'DNS order applied, reboot required',
        );
      } else {
        logger.info(
          { host: ref.hostId, iface: ref.name, dns: desiredDNS },
          'DNS order applied',
        );
      }

      return { success: true, resultCode, simulated: false };
    },
};
