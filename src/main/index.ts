/**
 * logic-capture library entry point.
 *
 * Re-exports the tick-level capture engine, the instrument model built
 * around it, and the host tooling that drives a device or the model.
 *
 * @module index
 */

// Capture engine
export * from './core/controller';
export * from './core/controller_types';
export * from './core/ring_buffer';
export * from './core/sample_divider';
export * from './core/trigger_detector';

// Instrument model
export * from './instrument/instrument';
export * from './instrument/pwm_generator';
export * from './instrument/uart_tx';
export * from './instrument/sim_link';

// Protocol
export * from './protocol/constants';
export * from './protocol/types';
export * from './protocol/command_builder';
export * from './protocol/rate_calc';
export * from './protocol/stream';

// Host
export * from './transport/link_types';
export * from './transport/la_usb';
export * from './transport/port_scanner';
export * from './host/capture_session';
export * from './host/rate_sweep';
export * from './analysis/channels';
export * from './analysis/vcd_export';
export * from './analysis/csv_export';
