export const FLASH_RECEIVER_ABI = [
  'function flashBorrow(address pool, uint256 amount0Out, uint256 amount1Out, bytes data) external',
];

export default FLASH_RECEIVER_ABI;
