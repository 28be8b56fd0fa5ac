
/**
 * jest global setup. tests run east of UTC so that any date code using
 * UTC fields where it should use calendar fields lands on the wrong day.
 */
export default (): void => {
  process.env.TZ = 'Asia/Tokyo';
};
