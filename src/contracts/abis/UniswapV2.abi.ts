export const UNISWAP_V2_FACTORY_ABI = [
  'function getPair(address tokenA, address tokenB) external view returns (address pair)',
];

export const UNISWAP_V2_PAIR_ABI = [
  'function token0() external view returns (address)',
  'function token1() external view returns (address)',
  'function getReserves() external view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
  'function swap(uint256 amount0Out, uint256 amount1Out, address to, bytes data) external',
];

// Implemented by the borrowing contract; the pair calls it between sending and re-checking balances.
export const UNISWAP_V2_CALLEE_ABI = [
  'function uniswapV2Call(address sender, uint256 amount0, uint256 amount1, bytes data) external',
];
