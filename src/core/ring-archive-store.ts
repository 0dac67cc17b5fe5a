// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {Base64} from 'js-base64';
import {inject, injectable} from 'tsyringe-neo';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {KeeperError} from './errors/keeper-error.js';
import {type Zippy} from './zippy.js';
import {PathEx} from '../business/utils/path-ex.js';
import * as constants from './constants.js';
import {type K8Factory} from '../integration/kube/k8-factory.js';
import {type K8} from '../integration/kube/k8.js';
import {NamespaceName} from '../integration/kube/resources/namespace/namespace-name.js';
import {type ConfigMap} from '../integration/kube/resources/config-map/config-map.js';
import {type OwnerReference} from '../integration/kube/resources/config-map/owner-reference.js';
import {ResourceNotFoundError} from '../integration/kube/errors/resource-operation-errors.js';
import {K8ClientConfigMap} from '../integration/kube/k8-client/resources/config-map/k8-client-config-map.js';
import {type Optional} from '../types/index.js';

export interface RingArchiveSettings {
  /** Directory holding the builder and ring files */
  ringDirectory: string;
  configMapName: string;
  /** ConfigMap key holding the base64 encoded archive */
  dataKey: string;
  /** Defaults to the namespace of the kube context, then to `default` */
  namespace?: NamespaceName;
  /** Kubeconfig context, defaults to the current context */
  context?: string;
  /** Owner of a newly created ConfigMap */
  owner?: OwnerReference;
}

/**
 * Moves the ring directory into and out of a ConfigMap as a base64 encoded gzipped tarball.
 *
 * The ConfigMap returned by the last fetch or write is kept in the ring directory as the response file. Its presence
 * makes the next persist replace the stored ConfigMap instead of creating one.
 */
@injectable()
export class RingArchiveStore {
  private readonly k8Factory: K8Factory;
  private readonly zippy: Zippy;
  private readonly logger: KeeperLogger;

  public constructor(
    @inject(InjectTokens.K8Factory) k8Factory?: K8Factory,
    @inject(InjectTokens.Zippy) zippy?: Zippy,
    @inject(InjectTokens.KeeperLogger) logger?: KeeperLogger,
  ) {
    this.k8Factory = patchInject(k8Factory, InjectTokens.K8Factory, this.constructor.name);
    this.zippy = patchInject(zippy, InjectTokens.Zippy, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  public responseFilePath(settings: RingArchiveSettings): string {
    return PathEx.join(settings.ringDirectory, constants.CONFIG_MAP_RESPONSE_FILE);
  }

  /**
   * Reads the ConfigMap and extracts its archive into the ring directory.
   *
   * @returns false when the ConfigMap does not exist, the stale response file is then removed
   * @throws KubeApiError if the API server answers with an unexpected status
   */
  public async fetch(settings: RingArchiveSettings): Promise<boolean> {
    const k8: K8 = this.k8(settings);
    const namespace: NamespaceName = this.namespace(settings, k8);
    const responseFile: string = this.responseFilePath(settings);

    let configMap: ConfigMap;
    try {
      configMap = await k8.configMaps().read(namespace, settings.configMapName);
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        fs.rmSync(responseFile, {force: true});
        this.logger.info(`ConfigMap ${settings.configMapName} not found in namespace ${namespace}`);
        return false;
      }
      throw error;
    }

    fs.mkdirSync(settings.ringDirectory, {recursive: true});
    this.writeResponseFile(settings, configMap);

    const encoded: Optional<string> = configMap.data?.[settings.dataKey];
    if (!encoded) {
      this.logger.warn(`ConfigMap ${settings.configMapName} has no '${settings.dataKey}' key, nothing to extract`);
      return true;
    }

    this.extract(encoded, settings.ringDirectory);
    this.logger.info(`Extracted ${settings.configMapName}/${settings.dataKey} into ${settings.ringDirectory}`);
    return true;
  }

  /**
   * Archives the ring directory into the ConfigMap, replacing it when a response file is present and creating it
   * otherwise. The response file is refreshed from the API server's answer.
   *
   * @returns the stored ConfigMap
   */
  public async persist(settings: RingArchiveSettings): Promise<ConfigMap> {
    if (!fs.existsSync(settings.ringDirectory)) {
      throw new KeeperError(`ring directory ${settings.ringDirectory} does not exist, nothing to push`);
    }

    const k8: K8 = this.k8(settings);
    const namespace: NamespaceName = this.namespace(settings, k8);
    const archive: string = this.archive(settings.ringDirectory);
    const stored: Optional<ConfigMap> = this.readResponseFile(settings, namespace);

    let result: ConfigMap;
    if (stored) {
      result = await k8.configMaps().replace({
        ...stored,
        data: {...stored.data, [settings.dataKey]: archive},
      });
      this.logger.info(`Replaced ConfigMap ${settings.configMapName} in namespace ${namespace}`);
    } else {
      result = await k8
        .configMaps()
        .create(
          namespace,
          settings.configMapName,
          {...constants.RING_CONFIG_MAP_LABELS},
          {[settings.dataKey]: archive},
          settings.owner ? [settings.owner] : undefined,
        );
      this.logger.info(`Created ConfigMap ${settings.configMapName} in namespace ${namespace}`);
    }

    this.writeResponseFile(settings, result);
    return result;
  }

  /**
   * Reads the response file, a response file describing another ConfigMap is ignored.
   * @throws DataValidationError if the response file is not a ConfigMap
   */
  public readResponseFile(settings: RingArchiveSettings, namespace: NamespaceName): Optional<ConfigMap> {
    const responseFile: string = this.responseFilePath(settings);
    if (!fs.existsSync(responseFile)) {
      return undefined;
    }

    let document: unknown;
    try {
      document = JSON.parse(fs.readFileSync(responseFile, 'utf8'));
    } catch (error) {
      throw new KeeperError(`failed to read response file ${responseFile}`, error);
    }

    const configMap: ConfigMap = K8ClientConfigMap.fromObject(document);
    if (configMap.name !== settings.configMapName || !configMap.namespace.equals(namespace)) {
      this.logger.warn(
        `Ignoring response file ${responseFile}, it describes ConfigMap ${configMap.name} ` +
          `in namespace ${configMap.namespace}`,
      );
      return undefined;
    }
    return configMap;
  }

  private writeResponseFile(settings: RingArchiveSettings, configMap: ConfigMap): void {
    const responseFile: string = this.responseFilePath(settings);
    fs.writeFileSync(responseFile, JSON.stringify(K8ClientConfigMap.toObject(configMap), null, 2));
    this.logger.debug(`Wrote response file ${responseFile}`);
  }

  private archive(ringDirectory: string): string {
    const temporaryDirectory: string = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'ringkeeper-'));
    try {
      const archiveFile: string = this.zippy.tar(
        ringDirectory,
        PathEx.join(temporaryDirectory, constants.RING_ARCHIVE_FILE),
        entryPath => path.basename(entryPath) !== constants.CONFIG_MAP_RESPONSE_FILE,
      );
      return Base64.fromUint8Array(fs.readFileSync(archiveFile));
    } finally {
      fs.rmSync(temporaryDirectory, {recursive: true, force: true});
    }
  }

  private extract(encoded: string, ringDirectory: string): void {
    const temporaryDirectory: string = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'ringkeeper-'));
    try {
      const archiveFile: string = PathEx.join(temporaryDirectory, constants.RING_ARCHIVE_FILE);
      fs.writeFileSync(archiveFile, Base64.toUint8Array(encoded));
      this.zippy.untar(archiveFile, ringDirectory);
    } finally {
      fs.rmSync(temporaryDirectory, {recursive: true, force: true});
    }
  }

  private k8(settings: RingArchiveSettings): K8 {
    return settings.context ? this.k8Factory.getK8(settings.context) : this.k8Factory.default();
  }

  private namespace(settings: RingArchiveSettings, k8: K8): NamespaceName {
    return settings.namespace ?? k8.defaultNamespace() ?? NamespaceName.of(constants.DEFAULT_NAMESPACE);
  }
}
