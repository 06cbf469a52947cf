import { EventEmitter } from 'events';
import { logger } from '../../utils/logger.js';
import { delay } from '../../utils/timing.js';
import { getEnvironmentConfig } from '../config/environment.js';
import {
  DisconnectCategory,
  type ConnectionState,
  type LifecyclePhase,
  type RecoveryAction,
  type RecoveryEvent,
} from '../../types/connection.js';
import { REQUIRED_CHARACTERISTICS, type EndpointRef, type LinkTarget } from '../../types/device.js';
import type { LinkEvent, TransportLink } from './transportLink.js';
import type { OperationQueue, EscalationEvent } from './operationQueue.js';
import { createDeviceQuirkPolicy, type DeviceQuirkPolicy } from './deviceQuirks.js';
import { createReconnectPolicy, type ReconnectPolicy } from './reconnectPolicy.js';
import { MeshLinkError, linkResetError, toMeshLinkError } from './errors.js';

export interface ConnectionLifecycleOptions {
  /** Encodes the want_config request for a handshake nonce */
  createWantConfig: (nonce: number) => Uint8Array;
  /** Receives every frame read from fromRadio */
  onFrame: (frame: Uint8Array) => void;
  quirkPolicy?: DeviceQuirkPolicy;
  reconnectPolicy?: ReconnectPolicy;
  requestedMtu?: number;
  drainIntervalMs?: number;
  maxDrainReads?: number;
  handshakeTimeoutMs?: number;
  authorizationTimeoutMs?: number;
  initialNonce?: number;
}

type AuthorizationOutcome = 'granted' | 'declined' | 'timeout' | 'cancelled';

interface PendingAuthorization {
  address: string;
  settle: (outcome: AuthorizationOutcome) => void;
}

const ACTIVE_PHASES: ReadonlySet<LifecyclePhase> = new Set<LifecyclePhase>([
  'connecting',
  'linkEstablished',
  'parameterNegotiation',
  'serviceResolution',
  'backlogDrain',
  'handshakeInProgress',
  'ready',
]);

/**
 * Connection Lifecycle
 *
 * Brings a link from "discovered" to "ready": pairing, link up, device
 * quirks, MTU negotiation, service resolution, backlog drain and the
 * want_config handshake. Owns reconnect scheduling; at most one reconnect
 * timer exists at a time.
 *
 * Every bring-up runs under a session number. Tearing the link down bumps
 * the session, so steps still running for an old session stop at their
 * next check instead of touching the new one.
 *
 * Emits:
 * - 'phase' (LifecyclePhase)
 * - 'state' (ConnectionState), a new frozen object per transition
 * - 'ready' (EndpointRef)
 * - 'linkLost' (reason: string) when a live or connecting link is torn down
 * - 'recovery' (RecoveryEvent) when a reconnect is scheduled
 * - 'gaveUp' (reason: string) when reconnect attempts are exhausted
 * - 'failed' (reason: string)
 */
export class ConnectionLifecycle extends EventEmitter {
  private readonly link: TransportLink;
  private readonly operations: OperationQueue;
  private readonly createWantConfig: (nonce: number) => Uint8Array;
  private readonly onFrame: (frame: Uint8Array) => void;
  private readonly quirkPolicy: DeviceQuirkPolicy;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly requestedMtu: number;
  private readonly drainIntervalMs: number;
  private readonly maxDrainReads: number;
  private readonly handshakeTimeoutMs: number;
  private readonly authorizationTimeoutMs: number;

  private phase: LifecyclePhase = 'idle';
  private state: ConnectionState = Object.freeze({ status: 'disconnected' });
  private session = 0;
  private target: LinkTarget | null = null;
  private endpoint: EndpointRef | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempt = 0;
  private userDisconnected = false;
  private refreshCacheOnNextAttempt = false;
  /** Set while the driver still owes us the callback for our own disconnect() */
  private ownDisconnectPending = false;
  private closing: Promise<void> = Promise.resolve();

  private nonce: number;
  private awaitingNonce: number | null = null;
  private handshakeComplete = false;
  private pendingAuthorization: PendingAuthorization | null = null;

  private draining = false;
  private drainRequested = false;

  private readonly unsubscribers: Array<() => void> = [];

  constructor(link: TransportLink, operations: OperationQueue, options: ConnectionLifecycleOptions) {
    super();
    const env = getEnvironmentConfig();
    this.link = link;
    this.operations = operations;
    this.createWantConfig = options.createWantConfig;
    this.onFrame = options.onFrame;
    this.quirkPolicy = options.quirkPolicy ?? createDeviceQuirkPolicy();
    this.reconnectPolicy = options.reconnectPolicy ?? createReconnectPolicy({
      stepMs: env.reconnectStepMs,
      maxDelayMs: env.reconnectMaxDelayMs,
      maxAttempts: env.maxReconnectAttempts,
    });
    this.requestedMtu = options.requestedMtu ?? env.requestedMtu;
    this.drainIntervalMs = options.drainIntervalMs ?? env.drainIntervalMs;
    this.maxDrainReads = options.maxDrainReads ?? env.maxDrainReads;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? env.handshakeTimeoutMs;
    this.authorizationTimeoutMs = options.authorizationTimeoutMs ?? env.authorizationTimeoutMs;
    this.nonce = options.initialNonce ?? Math.floor(Math.random() * 0x7fffffff);

    this.unsubscribers.push(
      link.onDisconnect((reasonCode) => this.handleDisconnect(reasonCode)),
      link.onAuthorization((address, granted) => this.handleAuthorization(address, granted))
    );

    const onEscalation = (event: EscalationEvent) => this.handleEscalation(event);
    operations.on('escalation', onEscalation);
    this.unsubscribers.push(() => operations.off('escalation', onEscalation));
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getPhase(): LifecyclePhase {
    return this.phase;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getEndpoint(): EndpointRef | null {
    return this.endpoint;
  }

  isReady(): boolean {
    return this.phase === 'ready';
  }

  hasPendingReconnect(): boolean {
    return this.reconnectTimer !== null;
  }

  getReconnectAttempt(): number {
    return this.reconnectAttempt;
  }

  // ─── Commands ──────────────────────────────────────────────────────

  /**
   * Bring the link up. Resolves once Ready; rejects with the error that
   * stopped the bring-up (a lost link keeps reconnecting in the background).
   */
  async connect(target: LinkTarget): Promise<void> {
    this.userDisconnected = false;
    this.target = target;
    this.cancelReconnect();
    this.reconnectAttempt = 0;

    if (ACTIVE_PHASES.has(this.phase)) {
      this.teardown('new connect requested');
      await this.awaitClose();
    }
    await this.establish(target);
  }

  /**
   * User-initiated disconnect. Auto-reconnect stays off until the next
   * connect() or forceReconnect().
   */
  async disconnect(): Promise<void> {
    logger.info('🔌 User-initiated disconnect');
    this.userDisconnected = true;
    this.cancelReconnect();
    this.supersede('user disconnect');
    this.setPhase('disconnected');
    this.setState({ status: 'disconnected' });
    await this.closeLink();
  }

  /**
   * Tear down and reconnect to the last target immediately
   */
  async forceReconnect(): Promise<void> {
    const target = this.target;
    if (!target) {
      throw new MeshLinkError('No previous target to reconnect to', 'TRANSPORT_UNAVAILABLE');
    }
    logger.info(`🔄 Forced reconnect to ${target.address}`);
    this.userDisconnected = false;
    this.cancelReconnect();
    this.reconnectAttempt = 0;
    this.teardown('forced reconnect');
    await this.awaitClose();
    await this.establish(target);
  }

  /**
   * Config-complete token from the radio. Returns true when it finished
   * the handshake in progress.
   */
  handleConfigComplete(id: number): boolean {
    if (this.phase === 'handshakeInProgress' && this.awaitingNonce === id) {
      logger.info(`✅ Handshake complete (config id ${id})`);
      this.handshakeComplete = true;
      this.awaitingNonce = null;
      return true;
    }
    logger.debug(`Ignoring config-complete id ${id} (phase ${this.phase}, expecting ${this.awaitingNonce})`);
    return false;
  }

  /**
   * The radio reported that it rebooted: the session on its side is gone
   */
  handleRadioRebooted(): void {
    if (!ACTIVE_PHASES.has(this.phase)) {
      return;
    }
    logger.warn('⚠️  Radio rebooted, treating as lost connection');
    this.handleLinkLoss(DisconnectCategory.LOST_CONNECTION, 'radio rebooted');
  }

  /**
   * fromNum notification while Ready: read fromRadio until empty.
   * Requests arriving mid-drain fold into one more pass.
   */
  requestDrain(): void {
    if (this.phase !== 'ready') {
      logger.debug(`Drain request ignored in phase ${this.phase}`);
      return;
    }
    if (this.draining) {
      this.drainRequested = true;
      return;
    }

    const session = this.session;
    this.draining = true;
    void (async () => {
      try {
        do {
          this.drainRequested = false;
          await this.drainFromRadio(session);
        } while (this.drainRequested && session === this.session);
      } catch (error) {
        const err = toMeshLinkError(error);
        if (err.code === 'LINK_RESET') {
          logger.debug(`Drain stopped: ${err.message}`);
        } else {
          logger.warn(`⚠️  Drain failed: ${err.message}`);
        }
      } finally {
        this.draining = false;
      }
    })();
  }

  /**
   * Schedule a reconnect for a lost link. Returns false when one is
   * already pending, there is no target, or attempts are exhausted.
   */
  scheduleReconnect(category: DisconnectCategory): boolean {
    if (this.reconnectTimer) {
      logger.debug('Reconnect already pending, not scheduling another');
      return false;
    }
    const target = this.target;
    if (!target || this.userDisconnected) {
      return false;
    }

    const attempt = this.reconnectAttempt + 1;
    if (attempt > this.reconnectPolicy.maxAttempts) {
      const reason = `${this.reconnectPolicy.describe(category)}: gave up after ${this.reconnectPolicy.maxAttempts} reconnect attempts`;
      logger.error(`❌ ${reason}`);
      this.fail(reason);
      this.emit('gaveUp', reason);
      return false;
    }

    const recoverable = category === DisconnectCategory.NORMAL ? DisconnectCategory.LOST_CONNECTION : category;
    const action = this.reconnectPolicy.recoveryFor(recoverable);
    const delayMs = this.reconnectPolicy.delayFor(attempt);
    this.reconnectAttempt = attempt;
    if (recoverable === DisconnectCategory.STALE_CACHE) {
      this.refreshCacheOnNextAttempt = true;
    }

    logger.info(`🔄 Scheduling ${action} in ${delayMs}ms (attempt ${attempt}/${this.reconnectPolicy.maxAttempts})`);
    this.setPhase('disconnected');
    this.setState({ status: 'disconnected' });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.runRecovery(action, target).catch((error: unknown) => {
        logger.warn(`⚠️  Reconnect attempt ${attempt} failed: ${toMeshLinkError(error).message}`);
      });
    }, delayMs);

    const event: RecoveryEvent = { action, category: recoverable, attempt, delayMs };
    this.emit('recovery', event);
    return true;
  }

  /**
   * Stop everything and detach from the link and queue
   */
  async dispose(): Promise<void> {
    this.userDisconnected = true;
    this.cancelReconnect();
    this.supersede('disposed');
    this.setPhase('disconnected');
    this.setState({ status: 'disconnected' });
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    await this.closeLink();
  }

  // ─── Bring-up ──────────────────────────────────────────────────────

  private async establish(target: LinkTarget): Promise<void> {
    const session = ++this.session;
    this.endpoint = null;
    this.setPhase('connecting');
    this.setState({ status: 'connecting' });

    try {
      await this.runSequence(session, target);
    } catch (raw) {
      const error = toMeshLinkError(raw);
      if (session !== this.session) {
        // Superseded: whoever bumped the session owns recovery
        throw error;
      }

      if (error.code === 'HANDSHAKE_FAILED') {
        logger.error(`❌ Handshake failed at ${error.stage ?? 'unknown stage'}: ${error.message}`);
        this.fail(error.message);
        await this.closeLink();
        throw error;
      }

      const category = error.status === undefined
        ? DisconnectCategory.LOST_CONNECTION
        : this.reconnectPolicy.classify(error.status);
      this.handleLinkLoss(category, error.message);
      throw error;
    }
  }

  private async runSequence(session: number, target: LinkTarget): Promise<void> {
    if (this.link.requiresAuthorization(target)) {
      await this.authorize(session, target);
    }

    logger.info(`🔗 Connecting to ${target.name ?? target.address}...`);
    let event: LinkEvent;
    try {
      event = await this.link.connect(target);
    } catch (error) {
      throw new MeshLinkError(`Connect failed: ${toMeshLinkError(error).message}`, 'OPERATION_FAILED', {
        stage: 'connect',
        cause: error,
      });
    }
    this.assertSession(session);
    this.ownDisconnectPending = false;
    if (event.type === 'linkDown') {
      throw new MeshLinkError(`Link down during connect (code ${event.reasonCode})`, 'OPERATION_FAILED', {
        stage: 'connect',
        status: event.reasonCode,
      });
    }

    this.endpoint = event.endpoint;
    this.setPhase('linkEstablished');
    await this.applyQuirks(event.endpoint);
    this.assertSession(session);

    this.setPhase('parameterNegotiation');
    await this.negotiateMtu(session);

    this.setPhase('serviceResolution');
    await this.resolveServices();
    this.assertSession(session);

    this.setPhase('backlogDrain');
    const drained = await this.drainFromRadio(session);
    logger.debug(`📥 Backlog drain read ${drained} frame(s)`);

    this.setPhase('handshakeInProgress');
    await this.performHandshake(session);

    // Notifications only once the radio has finished streaming its config
    await this.operations.setNotify('fromNum', true);
    this.assertSession(session);

    const endpoint = this.endpoint ?? event.endpoint;
    this.reconnectAttempt = 0;
    this.setPhase('ready');
    this.setState({ status: 'connected', endpoint });
    logger.info(`✅ Link ready: ${endpoint.name ?? endpoint.address}${endpoint.mtu ? ` (mtu ${endpoint.mtu})` : ''}`);
    this.emit('ready', endpoint);
  }

  private async authorize(session: number, target: LinkTarget): Promise<void> {
    logger.info(`🔐 Pairing required for ${target.address}, waiting for authorization...`);
    const outcome = await new Promise<AuthorizationOutcome>((resolve) => {
      const timer = setTimeout(() => settle('timeout'), this.authorizationTimeoutMs);
      const settle = (result: AuthorizationOutcome) => {
        clearTimeout(timer);
        if (this.pendingAuthorization?.settle === settle) {
          this.pendingAuthorization = null;
        }
        resolve(result);
      };
      this.pendingAuthorization = { address: target.address, settle };
      this.link.requestAuthorization(target);
    });

    this.assertSession(session);
    switch (outcome) {
      case 'granted':
        logger.info(`✅ Authorization granted for ${target.address}`);
        return;
      case 'declined':
        throw new MeshLinkError('auth declined', 'HANDSHAKE_FAILED', { stage: 'authorization' });
      case 'timeout':
        throw new MeshLinkError(`auth timed out after ${this.authorizationTimeoutMs}ms`, 'HANDSHAKE_FAILED', {
          stage: 'authorization',
        });
      case 'cancelled':
        throw linkResetError('authorization cancelled');
    }
  }

  private handleAuthorization(address: string, granted: boolean): void {
    const pending = this.pendingAuthorization;
    if (!pending || pending.address !== address) {
      logger.debug(`Ignoring authorization result for ${address}`);
      return;
    }
    pending.settle(granted ? 'granted' : 'declined');
  }

  private async applyQuirks(endpoint: EndpointRef): Promise<void> {
    const deviceClass = this.quirkPolicy.classify(endpoint);
    const quirks = this.quirkPolicy.quirksFor(deviceClass);
    const refresh = quirks.invalidateCacheBeforeNegotiation || this.refreshCacheOnNextAttempt;
    this.refreshCacheOnNextAttempt = false;
    logger.debug(`Device class ${deviceClass} for ${endpoint.name ?? endpoint.address}`);

    if (!refresh) {
      return;
    }
    if (!this.link.invalidateCache) {
      logger.debug('Transport has no service cache to invalidate');
      return;
    }
    try {
      await this.link.invalidateCache();
      logger.info('🧹 Service cache invalidated');
    } catch (error) {
      logger.warn(`⚠️  Service cache invalidation failed: ${toMeshLinkError(error).message}`);
    }
  }

  private async negotiateMtu(session: number): Promise<void> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        const mtu = await this.link.requestMtu(this.requestedMtu);
        this.assertSession(session);
        if (this.endpoint) {
          this.endpoint = { ...this.endpoint, mtu };
        }
        logger.debug(`MTU negotiated: ${mtu}`);
        return;
      } catch (error) {
        this.assertSession(session);
        logger.warn(`⚠️  MTU request ${attempt}/2 failed: ${toMeshLinkError(error).message}`);
      }
    }
    logger.warn('⚠️  Continuing with the default MTU');
  }

  private async resolveServices(): Promise<void> {
    let found: readonly string[];
    try {
      found = await this.link.discoverServices();
    } catch (error) {
      throw new MeshLinkError(`Service discovery failed: ${toMeshLinkError(error).message}`, 'HANDSHAKE_FAILED', {
        stage: 'serviceResolution',
        cause: error,
      });
    }

    const missing = REQUIRED_CHARACTERISTICS.filter((id) => !found.includes(id));
    if (missing.length > 0) {
      throw new MeshLinkError(`Missing characteristics: ${missing.join(', ')}`, 'HANDSHAKE_FAILED', {
        stage: 'serviceResolution',
      });
    }
  }

  /**
   * Read fromRadio until it comes back empty. Returns the frame count.
   */
  private async drainFromRadio(session: number): Promise<number> {
    let frames = 0;
    for (let reads = 0; reads < this.maxDrainReads; reads++) {
      this.assertSession(session);
      const frame = await this.operations.read('fromRadio');
      this.assertSession(session);
      if (!frame || frame.length === 0) {
        return frames;
      }

      frames++;
      this.deliverFrame(frame);
      if (this.drainIntervalMs > 0) {
        await delay(this.drainIntervalMs);
      }
    }
    logger.warn(`⚠️  Drain stopped after ${this.maxDrainReads} reads with data still pending`);
    return frames;
  }

  private deliverFrame(frame: Uint8Array): void {
    try {
      this.onFrame(frame);
    } catch (error) {
      logger.error('❌ Frame handler threw:', error);
    }
  }

  private async performHandshake(session: number): Promise<void> {
    const nonce = this.nextNonce();
    this.awaitingNonce = nonce;
    this.handshakeComplete = false;
    logger.info(`🤝 Requesting config (nonce ${nonce})`);

    const deadline = Date.now() + this.handshakeTimeoutMs;
    await this.operations.reliableWrite('toRadio', this.createWantConfig(nonce));

    for (;;) {
      this.assertSession(session);
      await this.drainFromRadio(session);
      if (this.handshakeComplete) {
        return;
      }
      if (Date.now() >= deadline) {
        this.awaitingNonce = null;
        throw new MeshLinkError(
          `No config-complete for nonce ${nonce} within ${this.handshakeTimeoutMs}ms`,
          'HANDSHAKE_FAILED',
          { stage: 'handshake' }
        );
      }
      await delay(Math.max(this.drainIntervalMs, 1));
    }
  }

  private nextNonce(): number {
    this.nonce = (this.nonce + 1) % 0x7fffffff;
    if (this.nonce === 0) {
      this.nonce = 1;
    }
    return this.nonce;
  }

  // ─── Recovery ──────────────────────────────────────────────────────

  private handleDisconnect(reasonCode: number): void {
    if (this.ownDisconnectPending) {
      this.ownDisconnectPending = false;
      logger.debug(`Disconnect (code ${reasonCode}) reported for our own disconnect request`);
      return;
    }
    const category = this.reconnectPolicy.classify(reasonCode);
    if (!ACTIVE_PHASES.has(this.phase)) {
      logger.debug(`Disconnect (code ${reasonCode}) ignored in phase ${this.phase}`);
      return;
    }
    logger.warn(`🔌 Link down (code ${reasonCode}: ${this.reconnectPolicy.describe(category)})`);
    this.handleLinkLoss(category, `disconnect code ${reasonCode}`);
  }

  private handleEscalation(event: EscalationEvent): void {
    if (!ACTIVE_PHASES.has(this.phase)) {
      return;
    }
    logger.warn(`⚠️  ${event.kind} on ${event.target} escalated after ${event.attempts} attempt(s), reconnecting`);
    this.handleLinkLoss(DisconnectCategory.LOST_CONNECTION, `${event.kind} escalation`);
  }

  private handleLinkLoss(category: DisconnectCategory, reason: string): void {
    this.teardown(reason);
    if (this.userDisconnected) {
      this.setPhase('disconnected');
      this.setState({ status: 'disconnected' });
      return;
    }
    this.scheduleReconnect(category);
  }

  private async runRecovery(action: RecoveryAction, target: LinkTarget): Promise<void> {
    if (this.userDisconnected) {
      return;
    }
    if (action === 'restartStackAndReconnect') {
      if (this.link.restartAdapter) {
        logger.warn('♻️  Restarting adapter before reconnect');
        try {
          await this.link.restartAdapter();
        } catch (error) {
          logger.error('❌ Adapter restart failed:', toMeshLinkError(error).message);
        }
      } else {
        logger.warn('⚠️  Transport cannot restart its adapter, reconnecting without restart');
      }
      if (this.userDisconnected || this.reconnectTimer) {
        return;
      }
    }
    await this.establish(target);
  }

  private teardown(reason: string): void {
    const wasActive = ACTIVE_PHASES.has(this.phase);
    this.supersede(reason);
    this.setPhase('disconnected');
    this.setState({ status: 'disconnected' });
    if (wasActive) {
      this.emit('linkLost', reason);
    }
    this.closing = this.closeLink().catch((error: unknown) => {
      logger.error('❌ Error closing link:', toMeshLinkError(error).message);
    });
  }

  /**
   * Wait for the teardown's disconnect before bringing the link back up.
   * Rejects when something else took over the lifecycle meanwhile.
   */
  private async awaitClose(): Promise<void> {
    const session = this.session;
    await this.closing;
    if (session !== this.session || this.userDisconnected) {
      throw linkResetError('session superseded');
    }
  }

  /**
   * Invalidate the running session and fail everything queued under it
   */
  private supersede(reason: string): void {
    this.session++;
    this.awaitingNonce = null;
    this.handshakeComplete = false;
    this.pendingAuthorization?.settle('cancelled');
    this.operations.reset(reason);
  }

  private fail(reason: string): void {
    this.cancelReconnect();
    this.supersede(reason);
    this.setPhase('failed');
    this.setState({ status: 'failed', reason });
    this.emit('failed', reason);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private async closeLink(): Promise<void> {
    if (!this.link.isConnected()) {
      return;
    }
    this.ownDisconnectPending = true;
    try {
      await this.link.disconnect();
    } catch (error) {
      logger.warn(`⚠️  Link disconnect failed: ${toMeshLinkError(error).message}`);
    }
  }

  private assertSession(session: number): void {
    if (session !== this.session) {
      throw linkResetError('session superseded');
    }
  }

  private setPhase(phase: LifecyclePhase): void {
    if (phase === this.phase) return;
    logger.debug(`Lifecycle: ${this.phase} -> ${phase}`);
    this.phase = phase;
    this.emit('phase', phase);
  }

  private setState(next: ConnectionState): void {
    const current = this.state;
    if (current.status === next.status) {
      if (next.status === 'disconnected' || next.status === 'connecting') return;
      if (next.status === 'failed' && current.status === 'failed' && current.reason === next.reason) return;
    }
    this.state = Object.freeze(next);
    this.emit('state', this.state);
  }
}
