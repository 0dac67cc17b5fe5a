// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type K8Factory} from '../k8-factory.js';
import {type K8} from '../k8.js';
import {K8Client} from './k8-client.js';

@injectable()
export class K8ClientFactory implements K8Factory {
  private readonly k8Clients: Map<string, K8> = new Map<string, K8>();
  private defaultK8?: K8;

  public getK8(context: string): K8 {
    let k8: K8 | undefined = this.k8Clients.get(context);
    if (!k8) {
      k8 = new K8Client(context);
      this.k8Clients.set(context, k8);
    }

    return k8;
  }

  public default(): K8 {
    if (!this.defaultK8) {
      this.defaultK8 = new K8Client();
    }

    return this.defaultK8;
  }
}
