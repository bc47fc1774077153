export enum WindowState {
    IDLE = 'IDLE',
    ARMED = 'ARMED'
}
