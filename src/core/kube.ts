import * as k8s from '@kubernetes/client-node';
import chalk from 'chalk';
import { logInfo } from '../utils/utils';

let coreV1: k8s.CoreV1Api | undefined;

export function initKube(context?: string, kubeconfigPath?: string) {
  const kc = new k8s.KubeConfig();

  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  if (context) {
    kc.setCurrentContext(context);
  }

  logInfo(`Active cluster: ${chalk.cyan(kc.getCurrentContext())}`);

  coreV1 = kc.makeApiClient(k8s.CoreV1Api);
}

export function getCoreV1(): k8s.CoreV1Api {
  if (!coreV1) {
    throw new Error('Kubernetes client not initialized. Call initKube(context) first.');
  }
  return coreV1;
}
