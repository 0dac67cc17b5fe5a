// SPDX-License-Identifier: Apache-2.0

import * as k8s from '@kubernetes/client-node';
import {type K8} from '../k8.js';
import {type ConfigMaps} from '../resources/config-map/config-maps.js';
import {NamespaceName} from '../resources/namespace/namespace-name.js';
import {K8ClientConfigMaps} from './resources/config-map/k8-client-config-maps.js';
import {KeeperError} from '../../../core/errors/keeper-error.js';

/**
 * A kubernetes API wrapper class providing the functionalities required by ringkeeper.
 *
 * The kubeconfig is loaded the way kubectl does it, so inside a pod the service account token and CA are used.
 */
export class K8Client implements K8 {
  private readonly kubeConfig: k8s.KubeConfig;
  private readonly k8ConfigMaps: ConfigMaps;

  /**
   * Create a client for the given context, or for the kubeconfig current context when none is given
   * @param context - name of a kubeconfig context
   */
  public constructor(private readonly context?: string) {
    this.kubeConfig = K8Client.getKubeConfig(this.context);

    if (!this.kubeConfig.getCurrentContext()) {
      throw new KeeperError('No active kubernetes context found. Please set current kubernetes context.');
    }

    if (!this.kubeConfig.getCurrentCluster()) {
      throw new KeeperError('No active kubernetes cluster found. Please set a context with a cluster.');
    }

    this.k8ConfigMaps = new K8ClientConfigMaps(this.kubeConfig.makeApiClient(k8s.CoreV1Api));
  }

  private static getKubeConfig(context?: string): k8s.KubeConfig {
    const kubeConfig: k8s.KubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromDefault();

    if (context) {
      if (!kubeConfig.getContextObject(context)) {
        throw new KeeperError(`No kube config context found with name ${context}`);
      }

      kubeConfig.setCurrentContext(context);
    }

    return kubeConfig;
  }

  public configMaps(): ConfigMaps {
    return this.k8ConfigMaps;
  }

  public defaultNamespace(): NamespaceName | undefined {
    const namespace: string | undefined = this.kubeConfig.getContextObject(
      this.kubeConfig.getCurrentContext(),
    )?.namespace;
    return namespace ? NamespaceName.of(namespace) : undefined;
  }
}
